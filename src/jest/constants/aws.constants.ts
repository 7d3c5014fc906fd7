import {Task as EcsTask, TaskDefinition} from "@aws-sdk/client-ecs";
import {Role} from "@aws-sdk/client-iam";

export const MOCK_REGION: string = 'us-east-1';
export const MOCK_ACCOUNT_ID: string = '123456789012';
export const MOCK_CLUSTER_NAME: string = 'test-cluster';

export const MOCK_REPOSITORY_URI: string = '123456789012.dkr.ecr.us-east-1.amazonaws.com/web';
export const MOCK_ROLE_ARN: string = 'arn:aws:iam::123456789012:role/ecsTaskExecutionRole';
export const MOCK_EXECUTION_ROLE: Role = {
    Path: '/',
    RoleName: 'ecsTaskExecutionRole',
    RoleId: 'AROATESTROLEID',
    Arn: MOCK_ROLE_ARN,
    CreateDate: new Date('2024-01-01T00:00:00.000Z')
};
export const MOCK_SUBNET_IDS: string[] = ['subnet-0aaa1111', 'subnet-0bbb2222'];
export const MOCK_VPC_ID: string = 'vpc-0ccc3333';
export const MOCK_SECURITY_GROUP_ID: string = 'sg-0ddd4444';

export const MOCK_LOAD_BALANCER_ARN: string = 'arn:aws:elasticloadbalancing:us-east-1:123456789012:loadbalancer/app/my-alb/50dc6c495c0c9188';
export const MOCK_TARGET_GROUP_ARN: string = 'arn:aws:elasticloadbalancing:us-east-1:123456789012:targetgroup/my-alb-web/73e2d6bc24d8a067';
export const MOCK_LISTENER_ARNS: string[] = [
    'arn:aws:elasticloadbalancing:us-east-1:123456789012:listener/app/my-alb/50dc6c495c0c9188/f2f7dc8efc522ab2',
    'arn:aws:elasticloadbalancing:us-east-1:123456789012:listener/app/my-alb/50dc6c495c0c9188/0467ef3c8400ae65'
];
export const MOCK_RULE_ARN: string = 'arn:aws:elasticloadbalancing:us-east-1:123456789012:listener-rule/app/my-alb/50dc6c495c0c9188/f2f7dc8efc522ab2/9683b2d02a6cabee';

export const MOCK_TASK_DEFINITION_ARN: string = 'arn:aws:ecs:us-east-1:123456789012:task-definition/web:7';
export const MOCK_WORKER_TASK_DEFINITION_ARN: string = 'arn:aws:ecs:us-east-1:123456789012:task-definition/worker:2';
export const MOCK_SERVICE_ARN: string = 'arn:aws:ecs:us-east-1:123456789012:service/test-cluster/web';

// base64 of "AWS:test-secret"
export const MOCK_AUTHORIZATION_TOKEN: string = Buffer.from('AWS:test-secret').toString('base64');

export function taskArn(taskId: string): string {
    return `arn:aws:ecs:us-east-1:123456789012:task/test-cluster/${taskId}`;
}

export const MOCK_CREATED_AT: Date = new Date('2024-01-01T00:00:00.000Z');

/**
 * Four running tasks: two in group "web", one in "worker", and one started
 * by a service, which belongs to no group.
 */
export const MOCK_TASKS: Record<string, EcsTask> = {
    [taskArn('a1')]: {
        taskArn: taskArn('a1'),
        taskDefinitionArn: MOCK_TASK_DEFINITION_ARN,
        cpu: '256',
        memory: '512',
        createdAt: MOCK_CREATED_AT,
        desiredStatus: 'RUNNING',
        lastStatus: 'RUNNING',
        startedBy: 'fargate:web',
        attachments: [
            {
                type: 'ElasticNetworkInterface',
                details: [
                    {name: 'subnetId', value: 'subnet-0aaa1111'},
                    {name: 'networkInterfaceId', value: 'eni-0abc1234'},
                    {name: 'privateIPv4Address', value: '10.0.1.15'}
                ]
            }
        ]
    },
    [taskArn('a2')]: {
        taskArn: taskArn('a2'),
        taskDefinitionArn: MOCK_WORKER_TASK_DEFINITION_ARN,
        cpu: '512',
        memory: '1024',
        createdAt: MOCK_CREATED_AT,
        desiredStatus: 'RUNNING',
        lastStatus: 'PENDING',
        startedBy: 'fargate:worker'
    },
    [taskArn('a3')]: {
        taskArn: taskArn('a3'),
        taskDefinitionArn: MOCK_TASK_DEFINITION_ARN,
        cpu: '256',
        memory: '512',
        desiredStatus: 'RUNNING',
        lastStatus: 'RUNNING',
        startedBy: 'fargate:web'
    },
    [taskArn('a4')]: {
        taskArn: taskArn('a4'),
        taskDefinitionArn: MOCK_TASK_DEFINITION_ARN,
        cpu: '256',
        memory: '512',
        desiredStatus: 'RUNNING',
        lastStatus: 'RUNNING',
        startedBy: 'ecs-svc/9223370513488912375'
    }
};

export const MOCK_TASK_DEFINITIONS: Record<string, TaskDefinition> = {
    [MOCK_TASK_DEFINITION_ARN]: {
        taskDefinitionArn: MOCK_TASK_DEFINITION_ARN,
        taskRoleArn: 'arn:aws:iam::123456789012:role/web-task',
        containerDefinitions: [
            {
                name: 'web',
                image: `${MOCK_REPOSITORY_URI}:abc1234`,
                environment: [
                    {name: 'PORT', value: '8080'},
                    {name: 'LOG_LEVEL', value: 'debug'}
                ]
            }
        ]
    },
    [MOCK_WORKER_TASK_DEFINITION_ARN]: {
        taskDefinitionArn: MOCK_WORKER_TASK_DEFINITION_ARN,
        containerDefinitions: [
            {
                name: 'worker',
                image: 'busybox:1.36'
            }
        ]
    }
};
