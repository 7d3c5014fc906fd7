import {
    DescribeTaskDefinitionCommand,
    DescribeTasksCommand,
    ECSClient,
    ListTasksCommand
} from "@aws-sdk/client-ecs";
import {mockClient} from "aws-sdk-client-mock";
import {EcsService} from "../services/ecs";
import {TaskInventory, eniDetails, groupTasks, runningFor, toTask} from "../fleet/inventory";
import {Task} from "../types";
import {
    MOCK_CLUSTER_NAME,
    MOCK_CREATED_AT,
    MOCK_REGION,
    MOCK_REPOSITORY_URI,
    MOCK_TASKS,
    MOCK_TASK_DEFINITIONS,
    MOCK_TASK_DEFINITION_ARN,
    taskArn
} from "./constants/aws.constants";

const WEB_TASK: Task = {
    taskId: 'a1',
    cpu: '256',
    memory: '512',
    createdAt: MOCK_CREATED_AT,
    desiredStatus: 'RUNNING',
    lastStatus: 'RUNNING',
    deploymentId: '7',
    image: `${MOCK_REPOSITORY_URI}:abc1234`,
    taskRole: 'arn:aws:iam::123456789012:role/web-task',
    envVars: [
        {key: 'PORT', value: '8080'},
        {key: 'LOG_LEVEL', value: 'debug'}
    ],
    eniId: 'eni-0abc1234',
    subnetId: 'subnet-0aaa1111',
    startedBy: 'fargate:web'
};

describe('task projections', () => {
    it('should read the ENI attachment details', () => {
        expect(eniDetails(MOCK_TASKS[taskArn('a1')].attachments)).toEqual({
            eniId: 'eni-0abc1234',
            subnetId: 'subnet-0aaa1111'
        });
        expect(eniDetails(undefined)).toEqual({eniId: '', subnetId: ''});
    });

    it('should merge a task with its task definition', () => {
        expect(toTask(MOCK_TASKS[taskArn('a1')], MOCK_TASK_DEFINITIONS[MOCK_TASK_DEFINITION_ARN])).toEqual(WEB_TASK);
    });

    it('should count whole seconds since creation', () => {
        expect(runningFor(WEB_TASK, new Date('2024-01-01T00:01:30.900Z'))).toBe(90);
        expect(runningFor(WEB_TASK, new Date('2023-12-31T23:59:00.000Z'))).toBe(0);
        expect(runningFor({...WEB_TASK, createdAt: undefined}, new Date())).toBe(0);
    });

    it('should group only tasks started as a task group', () => {
        const tasks = ['fargate:web', 'fargate:worker', 'ecs-svc/123', 'fargate:web', 'fargate:']
            .map((startedBy) => ({...WEB_TASK, startedBy}));

        expect(groupTasks(tasks)).toEqual([
            {taskGroupName: 'web', instances: 2},
            {taskGroupName: 'worker', instances: 1},
            {taskGroupName: '', instances: 1}
        ]);
    });
});

describe('TaskInventory', () => {
    const ecsMock = mockClient(ECSClient);
    let inventory: TaskInventory;

    function mockTwoPages(): void {
        ecsMock.on(ListTasksCommand)
            .resolvesOnce({taskArns: [taskArn('a1'), taskArn('a2')], nextToken: 'page-2'})
            .resolvesOnce({taskArns: [taskArn('a3'), taskArn('a4')]});
    }

    beforeEach(() => {
        ecsMock.reset();
        inventory = new TaskInventory(new EcsService(new ECSClient({region: MOCK_REGION}), MOCK_CLUSTER_NAME));

        ecsMock.on(DescribeTasksCommand).callsFake((input) => ({
            tasks: (input.tasks ?? []).filter((arn: string) => arn in MOCK_TASKS).map((arn: string) => MOCK_TASKS[arn])
        }));
        ecsMock.on(DescribeTaskDefinitionCommand).callsFake((input) => ({
            taskDefinition: MOCK_TASK_DEFINITIONS[input.taskDefinition ?? '']
        }));
    });

    it('should list task groups across every page', async () => {
        mockTwoPages();

        await expect(inventory.listTaskGroups()).resolves.toEqual([
            {taskGroupName: 'web', instances: 2},
            {taskGroupName: 'worker', instances: 1}
        ]);

        expect(ecsMock.commandCalls(ListTasksCommand)).toHaveLength(2);
        expect(ecsMock.commandCalls(ListTasksCommand)[0].args[0].input).toMatchObject({cluster: MOCK_CLUSTER_NAME});
        expect(ecsMock.commandCalls(DescribeTasksCommand).map((call) => call.args[0].input.tasks)).toEqual([
            [taskArn('a1'), taskArn('a2')],
            [taskArn('a3'), taskArn('a4')]
        ]);
    });

    it('should describe each task definition once per query', async () => {
        mockTwoPages();

        await inventory.listTaskGroups();

        const described = ecsMock.commandCalls(DescribeTaskDefinitionCommand)
            .map((call) => call.args[0].input.taskDefinition);
        expect(described).toEqual([
            MOCK_TASK_DEFINITION_ARN,
            'arn:aws:ecs:us-east-1:123456789012:task-definition/worker:2'
        ]);
    });

    it('should filter service tasks to Fargate', async () => {
        ecsMock.on(ListTasksCommand).resolves({taskArns: [taskArn('a1')]});

        await expect(inventory.describeTasksForService('web')).resolves.toEqual([WEB_TASK]);
        expect(ecsMock.commandCalls(ListTasksCommand)[0].args[0].input).toMatchObject({
            cluster: MOCK_CLUSTER_NAME,
            serviceName: 'web',
            launchType: 'FARGATE'
        });
    });

    it('should find task group members by their started-by tag', async () => {
        ecsMock.on(ListTasksCommand).resolves({taskArns: [taskArn('a2')]});

        await expect(inventory.describeTasksForTaskGroup('worker')).resolves.toEqual([
            {
                taskId: 'a2',
                cpu: '512',
                memory: '1024',
                createdAt: MOCK_CREATED_AT,
                desiredStatus: 'RUNNING',
                lastStatus: 'PENDING',
                deploymentId: '2',
                image: 'busybox:1.36',
                taskRole: '',
                envVars: [],
                eniId: '',
                subnetId: '',
                startedBy: 'fargate:worker'
            }
        ]);
        expect(ecsMock.commandCalls(ListTasksCommand)[0].args[0].input).toMatchObject({startedBy: 'fargate:worker'});
    });

    it('should not describe anything when no tasks are listed', async () => {
        ecsMock.on(ListTasksCommand).resolves({taskArns: []});

        await expect(inventory.describeTasksForService('web')).resolves.toEqual([]);
        expect(ecsMock.commandCalls(DescribeTasksCommand)).toHaveLength(0);
    });

    it('should describe explicit ids in batches of 100', async () => {
        const ids = Array.from({length: 150}, (_, index) => `t${index}`);

        await inventory.describeTasks(ids);

        const batches = ecsMock.commandCalls(DescribeTasksCommand).map((call) => call.args[0].input.tasks ?? []);
        expect(batches.map((batch) => batch.length)).toEqual([100, 50]);
        expect(batches[1][0]).toBe('t100');
    });

    it('should make no calls when already aborted', async () => {
        mockTwoPages();
        const controller = new AbortController();
        controller.abort();

        await expect(inventory.describeTasksForService('web', {signal: controller.signal}))
            .rejects.toHaveProperty('name', 'AbortError');
        expect(ecsMock.commandCalls(ListTasksCommand)).toHaveLength(0);
        expect(ecsMock.commandCalls(DescribeTasksCommand)).toHaveLength(0);
    });

    it('should stop paging once aborted between pages', async () => {
        const controller = new AbortController();
        ecsMock.on(ListTasksCommand).callsFake(() => {
            controller.abort();
            return {taskArns: [taskArn('a1'), taskArn('a2')], nextToken: 'page-2'};
        });

        await expect(inventory.listTaskGroups({signal: controller.signal})).rejects.toHaveProperty('name', 'AbortError');
        expect(ecsMock.commandCalls(ListTasksCommand)).toHaveLength(1);
        expect(ecsMock.commandCalls(DescribeTasksCommand)).toHaveLength(0);
    });

    it('should stop fetching task definitions once aborted', async () => {
        const controller = new AbortController();
        ecsMock.on(ListTasksCommand).resolves({taskArns: [taskArn('a1'), taskArn('a2')]});
        ecsMock.on(DescribeTaskDefinitionCommand).callsFake((input) => {
            controller.abort();
            return {taskDefinition: MOCK_TASK_DEFINITIONS[input.taskDefinition ?? '']};
        });

        await expect(inventory.listTaskGroups({signal: controller.signal})).rejects.toHaveProperty('name', 'AbortError');
        expect(ecsMock.commandCalls(DescribeTasksCommand)).toHaveLength(1);
        expect(ecsMock.commandCalls(DescribeTaskDefinitionCommand)).toHaveLength(1);
        expect(ecsMock.commandCalls(DescribeTaskDefinitionCommand)[0].args[1]).toEqual({abortSignal: controller.signal});
    });

    it('should wrap listing failures', async () => {
        ecsMock.on(ListTasksCommand).rejects(new Error('ClusterNotFoundException'));

        await expect(inventory.listTaskGroups()).rejects.toMatchObject({
            category: 'Could not list ECS tasks',
            message: 'ClusterNotFoundException'
        });
    });
});
