/**
 * ================================================================================
 * IAM SERVICE - Task Execution Role
 * ================================================================================
 *
 * Makes sure the role ECS assumes to pull images and write logs exists.
 *
 * REQUIRED AWS PERMISSIONS:
 * • IAM:GetRole, CreateRole - Look up or create the role
 * • IAM:AttachRolePolicy    - Attach the managed execution policy
 */

import {
    IAMClient,
    GetRoleCommand,
    CreateRoleCommand,
    AttachRolePolicyCommand,
    NoSuchEntityException,
    EntityAlreadyExistsException
} from '@aws-sdk/client-iam';
import { logger } from '../utils/logger';
import { remoteCall } from '../utils/errors';

export const EXECUTION_ROLE_NAME = 'ecsTaskExecutionRole';
export const EXECUTION_ROLE_POLICY_ARN = 'arn:aws:iam::aws:policy/service-role/AmazonECSTaskExecutionRolePolicy';

const ECS_TASKS_TRUST_POLICY = {
    Version: '2012-10-17',
    Statement: [
        {
            Effect: 'Allow',
            Principal: { Service: 'ecs-tasks.amazonaws.com' },
            Action: 'sts:AssumeRole'
        }
    ]
};

export class IamService {
    constructor(private readonly iam: IAMClient) {}

    /**
     * Look up the execution role, creating it when it is missing, and make sure
     * the managed execution policy is attached.
     *
     * @returns the role ARN
     *
     * //? Another caller creating the role first resolves to that role
     * //! The policy is attached on every call so a run that failed after
     * //! CreateRole converges when repeated; attaching twice is a no-op
     */
    async createOrGetExecutionRole(): Promise<string> {
        return remoteCall('Could not create ECS task execution IAM role', async () => {
            const arn = await this.findOrCreateRole();

            await this.iam.send(new AttachRolePolicyCommand({
                RoleName: EXECUTION_ROLE_NAME,
                PolicyArn: EXECUTION_ROLE_POLICY_ARN
            }));

            return arn;
        });
    }

    private async findOrCreateRole(): Promise<string> {
        const existing = await this.findRoleArn();
        if (existing) {
            logger.debug('Execution role already exists', { arn: existing });
            return existing;
        }

        logger.step('IAM_CREATE', `Creating ${EXECUTION_ROLE_NAME}`);

        try {
            const created = await this.iam.send(new CreateRoleCommand({
                RoleName: EXECUTION_ROLE_NAME,
                AssumeRolePolicyDocument: JSON.stringify(ECS_TASKS_TRUST_POLICY),
                Description: 'Allows ECS tasks to pull images and write logs'
            }));

            const arn = created.Role?.Arn;
            if (!arn) {
                throw new Error(`CreateRole returned no ARN for ${EXECUTION_ROLE_NAME}`);
            }
            return arn;
        } catch (error) {
            if (!(error instanceof EntityAlreadyExistsException)) {
                throw error;
            }

            const arn = await this.findRoleArn();
            if (!arn) {
                throw error;
            }
            return arn;
        }
    }

    private async findRoleArn(): Promise<string | undefined> {
        try {
            const result = await this.iam.send(new GetRoleCommand({ RoleName: EXECUTION_ROLE_NAME }));
            return result.Role?.Arn;
        } catch (error) {
            if (error instanceof NoSuchEntityException) {
                return undefined;
            }
            throw error;
        }
    }
}
