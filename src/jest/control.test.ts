import {ECSClient, RunTaskCommand, StopTaskCommand} from "@aws-sdk/client-ecs";
import {DescribeSecurityGroupsCommand, DescribeSubnetsCommand, DescribeVpcsCommand, EC2Client} from "@aws-sdk/client-ec2";
import {mockClient} from "aws-sdk-client-mock";
import {EcsService} from "../services/ecs";
import {NetworkService} from "../services/network";
import {TaskControl} from "../fleet/control";
import {RemoteOperationError, TaskStopError, ValidationError} from "../utils/errors";
import {
    MOCK_CLUSTER_NAME,
    MOCK_REGION,
    MOCK_SECURITY_GROUP_ID,
    MOCK_SUBNET_IDS,
    MOCK_VPC_ID,
    MOCK_WORKER_TASK_DEFINITION_ARN,
    taskArn
} from "./constants/aws.constants";

describe('TaskControl', () => {
    const ecsMock = mockClient(ECSClient);
    const ec2Mock = mockClient(EC2Client);
    let control: TaskControl;

    beforeEach(() => {
        ecsMock.reset();
        ec2Mock.reset();
        control = new TaskControl(
            new EcsService(new ECSClient({region: MOCK_REGION}), MOCK_CLUSTER_NAME),
            new NetworkService(new EC2Client({region: MOCK_REGION}))
        );

        ec2Mock.on(DescribeSubnetsCommand).resolves({Subnets: MOCK_SUBNET_IDS.map((SubnetId) => ({SubnetId}))});
        ec2Mock.on(DescribeVpcsCommand).resolves({Vpcs: [{VpcId: MOCK_VPC_ID}]});
        ec2Mock.on(DescribeSecurityGroupsCommand).resolves({SecurityGroups: [{GroupId: MOCK_SECURITY_GROUP_ID}]});
    });

    describe('runTask', () => {
        it('should place tasks in the default subnets and security group', async () => {
            ecsMock.on(RunTaskCommand).resolves({
                tasks: [{taskArn: taskArn('n1')}, {taskArn: taskArn('n2')}],
                failures: []
            });

            await expect(control.runTask({
                taskGroupName: 'nightly',
                taskDefinition: MOCK_WORKER_TASK_DEFINITION_ARN,
                count: 2
            })).resolves.toEqual([taskArn('n1'), taskArn('n2')]);

            expect(ecsMock.commandCalls(RunTaskCommand)[0].args[0].input).toEqual({
                cluster: MOCK_CLUSTER_NAME,
                count: 2,
                taskDefinition: MOCK_WORKER_TASK_DEFINITION_ARN,
                launchType: 'FARGATE',
                startedBy: 'fargate:nightly',
                networkConfiguration: {
                    awsvpcConfiguration: {
                        subnets: MOCK_SUBNET_IDS,
                        securityGroups: [MOCK_SECURITY_GROUP_ID],
                        assignPublicIp: 'ENABLED'
                    }
                }
            });
        });

        it('should use the given subnets and security groups without looking up defaults', async () => {
            ecsMock.on(RunTaskCommand).resolves({tasks: [{taskArn: taskArn('n1')}]});

            await control.runTask({
                taskGroupName: 'nightly',
                taskDefinition: 'worker',
                count: 1,
                subnetIds: ['subnet-0eee5555'],
                securityGroupIds: ['sg-0fff6666']
            });

            expect(ec2Mock.calls()).toHaveLength(0);
            expect(ecsMock.commandCalls(RunTaskCommand)[0].args[0].input.networkConfiguration).toEqual({
                awsvpcConfiguration: {
                    subnets: ['subnet-0eee5555'],
                    securityGroups: ['sg-0fff6666'],
                    assignPublicIp: 'ENABLED'
                }
            });
        });

        it('should treat reported failures as an error', async () => {
            ecsMock.on(RunTaskCommand).resolves({
                tasks: [],
                failures: [{arn: MOCK_WORKER_TASK_DEFINITION_ARN, reason: 'RESOURCE:MEMORY'}]
            });

            const failure = control.runTask({taskGroupName: 'nightly', taskDefinition: 'worker', count: 1});

            await expect(failure).rejects.toBeInstanceOf(RemoteOperationError);
            await expect(failure).rejects.toMatchObject({
                category: 'Could not run ECS task',
                message: `${MOCK_WORKER_TASK_DEFINITION_ARN}: RESOURCE:MEMORY`
            });
        });

        it('should validate the request before calling AWS', async () => {
            const failure = control.runTask({taskGroupName: 'nightly', taskDefinition: '', count: 0});

            await expect(failure).rejects.toBeInstanceOf(ValidationError);
            await expect(failure).rejects.toMatchObject({
                category: 'Invalid command line flags',
                violations: [
                    'Invalid task count 0 [specify a whole number of at least 1]',
                    'A task definition is required'
                ]
            });
            expect(ec2Mock.calls()).toHaveLength(0);
            expect(ecsMock.calls()).toHaveLength(0);
        });
    });

    describe('stopTasks', () => {
        it('should stop every task in order', async () => {
            ecsMock.on(StopTaskCommand).resolves({});

            await expect(control.stopTasks(['t1', 't2'])).resolves.toEqual(['t1', 't2']);
            expect(ecsMock.commandCalls(StopTaskCommand).map((call) => call.args[0].input)).toEqual([
                {cluster: MOCK_CLUSTER_NAME, task: 't1'},
                {cluster: MOCK_CLUSTER_NAME, task: 't2'}
            ]);
        });

        it('should report what was stopped and what was never attempted', async () => {
            ecsMock
                .on(StopTaskCommand).resolves({})
                .on(StopTaskCommand, {task: 't2'}).rejects(new Error('The referenced task was not found.'));

            const failure = control.stopTasks(['t1', 't2', 't3']);

            await expect(failure).rejects.toBeInstanceOf(TaskStopError);
            await expect(failure).rejects.toMatchObject({
                category: 'Could not stop ECS task',
                message: 'The referenced task was not found.',
                failed: 't2',
                stopped: ['t1'],
                remaining: ['t3']
            });
            expect(ecsMock.commandCalls(StopTaskCommand)).toHaveLength(2);
        });
    });
});
