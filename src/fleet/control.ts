import { EcsService } from '../services/ecs';
import { NetworkService } from '../services/network';
import { TaskStopError, Violations } from '../utils/errors';
import { logger } from '../utils/logger';
import { encodeStartedBy } from './startedBy';

export interface RunTaskRequest {
    taskGroupName: string;
    taskDefinition: string;
    count: number;
    subnetIds?: string[];         // Defaults to the default VPC subnets
    securityGroupIds?: string[];  // Defaults to the default VPC's "default" group
}

/**
 * Starts and stops ad-hoc task groups.
 */
export class TaskControl {
    constructor(
        private readonly ecs: EcsService,
        private readonly network: NetworkService
    ) {}

    /**
     * @returns the ARNs of the started tasks
     */
    async runTask(request: RunTaskRequest): Promise<string[]> {
        const violations = new Violations();

        if (!Number.isInteger(request.count) || request.count < 1) {
            violations.add(`Invalid task count ${request.count} [specify a whole number of at least 1]`);
        }
        if (!request.taskDefinition) {
            violations.add('A task definition is required');
        }
        violations.check('Invalid command line flags');

        const subnetIds = request.subnetIds?.length
            ? request.subnetIds
            : await this.network.defaultSubnetIds();
        const securityGroupIds = request.securityGroupIds?.length
            ? request.securityGroupIds
            : [await this.network.defaultSecurityGroupId()];

        logger.debug('Running task', { ...request, subnetIds, securityGroupIds });

        return this.ecs.runTask({
            taskDefinition: request.taskDefinition,
            count: request.count,
            startedBy: encodeStartedBy(request.taskGroupName),
            subnetIds,
            securityGroupIds
        });
    }

    /**
     * Stop tasks one at a time, in order.
     *
     * //! The first failure aborts the rest; TaskStopError reports both halves
     */
    async stopTasks(taskIds: string[]): Promise<string[]> {
        const stopped: string[] = [];

        for (const [index, taskId] of taskIds.entries()) {
            try {
                await this.ecs.stopTask(taskId);
            } catch (error) {
                throw new TaskStopError(taskId, stopped, taskIds.slice(index + 1), error);
            }

            stopped.push(taskId);
            logger.debug('Task stopped', { taskId });
        }
        return stopped;
    }
}
