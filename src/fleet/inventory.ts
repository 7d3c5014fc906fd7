/**
 * ================================================================================
 * TASK INVENTORY - Read Projections of Running Tasks
 * ================================================================================
 *
 * Lists and describes the tasks of a service or task group and enriches each
 * one with its task definition (image, role, environment) and its network
 * interface attachment.
 *
 * QUERY SHAPE:
 * • All ListTasks pages are consumed before anything is described
 * • Every page (or chunk of at most 100 ids) is described in its own call
 * • Task definitions are fetched once per query and cached for its duration
 */

import { Attachment, Task as EcsTask, TaskDefinition } from '@aws-sdk/client-ecs';
import { EnvVar, Task, TaskGroup } from '../types';
import { EcsService, TaskListFilter } from '../services/ecs';
import { decodeStartedBy, encodeStartedBy } from './startedBy';
import { logger } from '../utils/logger';

export const DESCRIBE_TASKS_BATCH_SIZE = 100;

const ENI_ATTACHMENT_TYPE = 'ElasticNetworkInterface';

export interface QueryOptions {
    signal?: AbortSignal;
}

type DefinitionCache = Map<string, Promise<TaskDefinition>>;

function lastSegment(value: string, separator: string): string {
    return value.slice(value.lastIndexOf(separator) + 1);
}

function chunk<T>(items: T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let index = 0; index < items.length; index += size) {
        chunks.push(items.slice(index, index + size));
    }
    return chunks;
}

/**
 * Network interface and subnet of the task's ENI attachment; empty strings
 * when the task has none.
 */
export function eniDetails(attachments: Attachment[] | undefined): { eniId: string; subnetId: string } {
    const details = { eniId: '', subnetId: '' };
    const eni = (attachments ?? []).find((attachment) => attachment.type === ENI_ATTACHMENT_TYPE);

    for (const detail of eni?.details ?? []) {
        if (detail.name === 'networkInterfaceId') {
            details.eniId = detail.value ?? '';
        } else if (detail.name === 'subnetId') {
            details.subnetId = detail.value ?? '';
        }
    }
    return details;
}

export function toTask(task: EcsTask, definition: TaskDefinition | undefined): Task {
    const container = definition?.containerDefinitions?.[0];
    const envVars: EnvVar[] = (container?.environment ?? []).map((pair) => ({
        key: pair.name ?? '',
        value: pair.value ?? ''
    }));

    return {
        taskId: lastSegment(task.taskArn ?? '', '/'),
        cpu: task.cpu ?? '',
        memory: task.memory ?? '',
        createdAt: task.createdAt,
        desiredStatus: task.desiredStatus ?? '',
        lastStatus: task.lastStatus ?? '',
        deploymentId: lastSegment(task.taskDefinitionArn ?? '', ':'),
        image: container?.image ?? '',
        taskRole: definition?.taskRoleArn ?? '',
        envVars,
        ...eniDetails(task.attachments),
        startedBy: task.startedBy ?? ''
    };
}

/**
 * Whole seconds since the task was created.
 */
export function runningFor(task: Task, now: Date = new Date()): number {
    if (!task.createdAt) {
        return 0;
    }
    return Math.max(0, Math.floor((now.getTime() - task.createdAt.getTime()) / 1000));
}

/**
 * Count tasks per task group, in the order groups are first seen. Tasks whose
 * started-by tag was not written by a task run belong to no group.
 */
export function groupTasks(tasks: Task[]): TaskGroup[] {
    const groups = new Map<string, TaskGroup>();

    for (const task of tasks) {
        const taskGroupName = decodeStartedBy(task.startedBy);
        if (taskGroupName === undefined) {
            continue;
        }

        const group = groups.get(taskGroupName);
        if (group) {
            group.instances++;
        } else {
            groups.set(taskGroupName, { taskGroupName, instances: 1 });
        }
    }
    return [...groups.values()];
}

export class TaskInventory {
    constructor(private readonly ecs: EcsService) {}

    async describeTasksForService(serviceName: string, options: QueryOptions = {}): Promise<Task[]> {
        return this.query({ serviceName, fargateOnly: true }, options.signal);
    }

    async describeTasksForTaskGroup(taskGroupName: string, options: QueryOptions = {}): Promise<Task[]> {
        return this.query({ startedBy: encodeStartedBy(taskGroupName) }, options.signal);
    }

    async listTaskGroups(options: QueryOptions = {}): Promise<TaskGroup[]> {
        return groupTasks(await this.query({}, options.signal));
    }

    /**
     * Describe tasks by id, DESCRIBE_TASKS_BATCH_SIZE at a time.
     */
    async describeTasks(taskIds: string[], options: QueryOptions = {}): Promise<Task[]> {
        return this.describeBatches(chunk(taskIds, DESCRIBE_TASKS_BATCH_SIZE), options.signal);
    }

    private async query(filter: TaskListFilter, signal?: AbortSignal): Promise<Task[]> {
        const batches: string[][] = [];

        for await (const taskArns of this.ecs.listTaskIdentifiers(filter, signal)) {
            if (taskArns.length > 0) {
                batches.push(taskArns);
            }
        }

        logger.debug('Listed tasks', { filter, pages: batches.length });
        return this.describeBatches(batches, signal);
    }

    private async describeBatches(batches: string[][], signal?: AbortSignal): Promise<Task[]> {
        const cache: DefinitionCache = new Map();
        const tasks: Task[] = [];

        for (const batch of batches) {
            signal?.throwIfAborted();

            for (const ecsTask of await this.ecs.describeTasks(batch, signal)) {
                const definition = ecsTask.taskDefinitionArn
                    ? await this.definition(ecsTask.taskDefinitionArn, cache, signal)
                    : undefined;
                tasks.push(toTask(ecsTask, definition));
            }
        }
        return tasks;
    }

    private definition(arn: string, cache: DefinitionCache, signal?: AbortSignal): Promise<TaskDefinition> {
        let pending = cache.get(arn);
        if (!pending) {
            signal?.throwIfAborted();
            pending = this.ecs.describeTaskDefinition(arn, signal);
            cache.set(arn, pending);
        }
        return pending;
    }
}
