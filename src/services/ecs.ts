/**
 * ================================================================================
 * ECS SERVICE - Fargate Compute Platform
 * ================================================================================
 *
 * Thin typed wrapper over the ECS API calls ecs-fleet makes. Every method is
 * scoped to the cluster given at construction and converts SDK failures into
 * RemoteOperationErrors.
 *
 * KEY FEATURES:
 * • Task Definitions - Register a single-container awsvpc revision
 * • Services         - Create a Fargate service, optionally behind a target group
 * • Tasks            - Run, stop, list (paginated) and describe tasks
 */

import {
    ECSClient,
    RegisterTaskDefinitionCommand,
    CreateServiceCommand,
    RunTaskCommand,
    StopTaskCommand,
    DescribeTasksCommand,
    DescribeTaskDefinitionCommand,
    ListTasksCommandInput,
    paginateListTasks,
    Task as EcsTask,
    TaskDefinition
} from '@aws-sdk/client-ecs';
import { EnvVar } from '../types';
import { logger } from '../utils/logger';
import { remoteCall } from '../utils/errors';

export const LOG_STREAM_PREFIX = 'fargate';

export interface TaskDefinitionInput {
    family: string;                 // Also used as the container name
    cpu: string;
    memory: string;
    executionRoleArn: string;
    image: string;
    port?: number;
    envVars: EnvVar[];
    logGroupName: string;
    logRegion: string;
}

export interface CreateServiceInput {
    name: string;
    taskDefinitionArn: string;
    subnetIds: string[];
    targetGroupArn?: string;
    port?: number;
}

export interface RunTaskInput {
    taskDefinition: string;
    count: number;
    startedBy: string;
    subnetIds: string[];
    securityGroupIds: string[];
}

export interface TaskListFilter {
    serviceName?: string;
    startedBy?: string;
    fargateOnly?: boolean;
}

export class EcsService {
    constructor(
        private readonly ecs: ECSClient,
        private readonly clusterName: string
    ) {}

    getClusterName(): string {
        return this.clusterName;
    }

    /**
     * @returns the ARN of the new task definition revision
     */
    async registerTaskDefinition(input: TaskDefinitionInput): Promise<string> {
        return remoteCall('Could not register task definition', async () => {
            const result = await this.ecs.send(new RegisterTaskDefinitionCommand({
                family: input.family,
                cpu: input.cpu,
                memory: input.memory,
                executionRoleArn: input.executionRoleArn,
                networkMode: 'awsvpc',
                requiresCompatibilities: ['FARGATE'],
                containerDefinitions: [
                    {
                        name: input.family,
                        image: input.image,
                        essential: true,
                        portMappings: input.port === undefined ? [] : [{ containerPort: input.port }],
                        environment: input.envVars.map(({ key, value }) => ({ name: key, value })),
                        logConfiguration: {
                            logDriver: 'awslogs',
                            options: {
                                'awslogs-group': input.logGroupName,
                                'awslogs-region': input.logRegion,
                                'awslogs-stream-prefix': LOG_STREAM_PREFIX
                            }
                        }
                    }
                ]
            }));

            const arn = result.taskDefinition?.taskDefinitionArn;
            if (!arn) {
                throw new Error(`RegisterTaskDefinition returned no ARN for ${input.family}`);
            }

            logger.debug('Task definition registered', { arn });
            return arn;
        });
    }

    /**
     * @returns the ARN of the new service
     */
    async createService(input: CreateServiceInput): Promise<string> {
        return remoteCall('Could not create ECS service', async () => {
            const loadBalancers = input.targetGroupArn
                ? [{ targetGroupArn: input.targetGroupArn, containerName: input.name, containerPort: input.port }]
                : [];

            const result = await this.ecs.send(new CreateServiceCommand({
                cluster: this.clusterName,
                serviceName: input.name,
                taskDefinition: input.taskDefinitionArn,
                desiredCount: 1,
                launchType: 'FARGATE',
                networkConfiguration: {
                    awsvpcConfiguration: {
                        subnets: input.subnetIds,
                        assignPublicIp: 'ENABLED'
                    }
                },
                loadBalancers
            }));

            return result.service?.serviceArn ?? '';
        });
    }

    /**
     * Start `count` copies of a task definition.
     *
     * //! A non-empty failures[] in the response is treated as an error
     */
    async runTask(input: RunTaskInput): Promise<string[]> {
        return remoteCall('Could not run ECS task', async () => {
            const result = await this.ecs.send(new RunTaskCommand({
                cluster: this.clusterName,
                count: input.count,
                taskDefinition: input.taskDefinition,
                launchType: 'FARGATE',
                startedBy: input.startedBy,
                networkConfiguration: {
                    awsvpcConfiguration: {
                        subnets: input.subnetIds,
                        securityGroups: input.securityGroupIds,
                        assignPublicIp: 'ENABLED'
                    }
                }
            }));

            const failures = result.failures ?? [];
            if (failures.length > 0) {
                throw new Error(failures.map((failure) => `${failure.arn ?? 'task'}: ${failure.reason ?? 'unknown reason'}`).join(', '));
            }

            return (result.tasks ?? []).flatMap((task) => task.taskArn ? [task.taskArn] : []);
        });
    }

    async stopTask(taskId: string): Promise<void> {
        await remoteCall('Could not stop ECS task', () =>
            this.ecs.send(new StopTaskCommand({ cluster: this.clusterName, task: taskId }))
        );
    }

    /**
     * Yield task ARNs page by page. The signal is checked before every page
     * is requested.
     */
    async *listTaskIdentifiers(filter: TaskListFilter = {}, signal?: AbortSignal): AsyncGenerator<string[]> {
        const input: ListTasksCommandInput = { cluster: this.clusterName };

        if (filter.serviceName) {
            input.serviceName = filter.serviceName;
        }
        if (filter.startedBy) {
            input.startedBy = filter.startedBy;
        }
        if (filter.fargateOnly) {
            input.launchType = 'FARGATE';
        }

        const pages = paginateListTasks({ client: this.ecs }, input);
        const next = () => remoteCall('Could not list ECS tasks', () => pages.next());

        while (true) {
            signal?.throwIfAborted();
            const page = await next();
            if (page.done) {
                return;
            }

            yield page.value.taskArns ?? [];
        }
    }

    async describeTasks(taskIds: string[], signal?: AbortSignal): Promise<EcsTask[]> {
        if (taskIds.length === 0) {
            return [];
        }

        return remoteCall('Could not describe ECS tasks', async () => {
            const result = await this.ecs.send(new DescribeTasksCommand({
                cluster: this.clusterName,
                tasks: taskIds
            }), { abortSignal: signal });
            return result.tasks ?? [];
        });
    }

    async describeTaskDefinition(taskDefinitionArn: string, signal?: AbortSignal): Promise<TaskDefinition> {
        return remoteCall('Could not describe ECS task definition', async () => {
            const result = await this.ecs.send(new DescribeTaskDefinitionCommand({
                taskDefinition: taskDefinitionArn
            }), { abortSignal: signal });

            if (!result.taskDefinition) {
                throw new Error(`Task definition ${taskDefinitionArn} not found`);
            }
            return result.taskDefinition;
        });
    }
}
