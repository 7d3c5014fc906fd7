import {
    AttachRolePolicyCommand,
    CreateRoleCommand,
    EntityAlreadyExistsException,
    GetRoleCommand,
    IAMClient,
    NoSuchEntityException
} from "@aws-sdk/client-iam";
import {
    CloudWatchLogsClient,
    CreateLogGroupCommand,
    ResourceAlreadyExistsException
} from "@aws-sdk/client-cloudwatch-logs";
import {
    DescribeNetworkInterfacesCommand,
    DescribeSecurityGroupsCommand,
    DescribeSubnetsCommand,
    DescribeVpcsCommand,
    EC2Client
} from "@aws-sdk/client-ec2";
import {mockClient} from "aws-sdk-client-mock";
import {EXECUTION_ROLE_POLICY_ARN, IamService} from "../services/iam";
import {LogGroupService, serviceLogGroupName} from "../services/logs";
import {NetworkService} from "../services/network";
import {
    MOCK_EXECUTION_ROLE,
    MOCK_REGION,
    MOCK_ROLE_ARN,
    MOCK_SECURITY_GROUP_ID,
    MOCK_SUBNET_IDS,
    MOCK_VPC_ID
} from "./constants/aws.constants";

describe('IamService', () => {
    const iamMock = mockClient(IAMClient);
    let iam: IamService;

    beforeEach(() => {
        iamMock.reset();
        iam = new IamService(new IAMClient({region: MOCK_REGION}));
    });

    it('should reuse an existing execution role', async () => {
        iamMock.on(GetRoleCommand).resolves({Role: MOCK_EXECUTION_ROLE});
        iamMock.on(AttachRolePolicyCommand).resolves({});

        await expect(iam.createOrGetExecutionRole()).resolves.toBe(MOCK_ROLE_ARN);
        expect(iamMock.commandCalls(CreateRoleCommand)).toHaveLength(0);
        expect(iamMock.commandCalls(AttachRolePolicyCommand)[0].args[0].input).toEqual({
            RoleName: 'ecsTaskExecutionRole',
            PolicyArn: EXECUTION_ROLE_POLICY_ARN
        });
    });

    it('should attach the execution policy when repeated after a failed attach', async () => {
        iamMock.on(GetRoleCommand)
            .rejectsOnce(new NoSuchEntityException({message: 'Role not found', $metadata: {}}))
            .resolves({Role: MOCK_EXECUTION_ROLE});
        iamMock.on(CreateRoleCommand).resolves({Role: MOCK_EXECUTION_ROLE});
        iamMock.on(AttachRolePolicyCommand)
            .rejectsOnce(new Error('Throttling'))
            .resolves({});

        await expect(iam.createOrGetExecutionRole()).rejects.toMatchObject({message: 'Throttling'});
        await expect(iam.createOrGetExecutionRole()).resolves.toBe(MOCK_ROLE_ARN);

        expect(iamMock.commandCalls(CreateRoleCommand)).toHaveLength(1);
        expect(iamMock.commandCalls(AttachRolePolicyCommand)).toHaveLength(2);
    });

    it('should create the role and attach the execution policy when missing', async () => {
        iamMock.on(GetRoleCommand).rejects(new NoSuchEntityException({message: 'Role not found', $metadata: {}}));
        iamMock.on(CreateRoleCommand).resolves({Role: MOCK_EXECUTION_ROLE});
        iamMock.on(AttachRolePolicyCommand).resolves({});

        await expect(iam.createOrGetExecutionRole()).resolves.toBe(MOCK_ROLE_ARN);

        const createInput = iamMock.commandCalls(CreateRoleCommand)[0].args[0].input;
        expect(createInput.RoleName).toBe('ecsTaskExecutionRole');
        expect(JSON.parse(createInput.AssumeRolePolicyDocument ?? '{}')).toEqual({
            Version: '2012-10-17',
            Statement: [
                {
                    Effect: 'Allow',
                    Principal: {Service: 'ecs-tasks.amazonaws.com'},
                    Action: 'sts:AssumeRole'
                }
            ]
        });
        expect(iamMock.commandCalls(AttachRolePolicyCommand)[0].args[0].input).toEqual({
            RoleName: 'ecsTaskExecutionRole',
            PolicyArn: EXECUTION_ROLE_POLICY_ARN
        });
    });

    it('should resolve to the existing role when creation races', async () => {
        iamMock.on(GetRoleCommand)
            .rejectsOnce(new NoSuchEntityException({message: 'Role not found', $metadata: {}}))
            .resolves({Role: MOCK_EXECUTION_ROLE});
        iamMock.on(CreateRoleCommand).rejects(new EntityAlreadyExistsException({message: 'Role exists', $metadata: {}}));
        iamMock.on(AttachRolePolicyCommand).resolves({});

        await expect(iam.createOrGetExecutionRole()).resolves.toBe(MOCK_ROLE_ARN);
        expect(iamMock.commandCalls(GetRoleCommand)).toHaveLength(2);
        expect(iamMock.commandCalls(AttachRolePolicyCommand)).toHaveLength(1);
    });

    it('should wrap permission failures', async () => {
        iamMock.on(GetRoleCommand).rejects(new Error('not authorized to perform iam:GetRole'));

        await expect(iam.createOrGetExecutionRole()).rejects.toMatchObject({
            category: 'Could not create ECS task execution IAM role',
            message: 'not authorized to perform iam:GetRole'
        });
    });
});

describe('LogGroupService', () => {
    const logsMock = mockClient(CloudWatchLogsClient);
    let logGroups: LogGroupService;

    beforeEach(() => {
        logsMock.reset();
        logGroups = new LogGroupService(new CloudWatchLogsClient({region: MOCK_REGION}));
    });

    it('should name service log groups after the service', () => {
        expect(serviceLogGroupName('web')).toBe('/fargate/service/web');
    });

    it('should create the log group', async () => {
        logsMock.on(CreateLogGroupCommand).resolves({});

        await expect(logGroups.createOrGetLogGroup('/fargate/service/web')).resolves.toBe('/fargate/service/web');
        expect(logsMock.commandCalls(CreateLogGroupCommand)[0].args[0].input).toEqual({logGroupName: '/fargate/service/web'});
    });

    it('should treat an existing log group as success', async () => {
        logsMock.on(CreateLogGroupCommand).rejects(
            new ResourceAlreadyExistsException({message: 'The specified log group already exists', $metadata: {}})
        );

        await expect(logGroups.createOrGetLogGroup('/fargate/service/web')).resolves.toBe('/fargate/service/web');
    });

    it('should wrap other failures', async () => {
        logsMock.on(CreateLogGroupCommand).rejects(new Error('Throttled'));

        await expect(logGroups.createOrGetLogGroup('/fargate/service/web')).rejects.toMatchObject({
            category: 'Could not create log group'
        });
    });
});

describe('NetworkService', () => {
    const ec2Mock = mockClient(EC2Client);
    let network: NetworkService;

    beforeEach(() => {
        ec2Mock.reset();
        network = new NetworkService(new EC2Client({region: MOCK_REGION}));
    });

    it('should read the default-for-az subnets', async () => {
        ec2Mock.on(DescribeSubnetsCommand).resolves({
            Subnets: MOCK_SUBNET_IDS.map((SubnetId) => ({SubnetId}))
        });

        await expect(network.defaultSubnetIds()).resolves.toEqual(MOCK_SUBNET_IDS);
        expect(ec2Mock.commandCalls(DescribeSubnetsCommand)[0].args[0].input).toEqual({
            Filters: [{Name: 'default-for-az', Values: ['true']}]
        });
    });

    it('should fail when the region has no default subnets', async () => {
        ec2Mock.on(DescribeSubnetsCommand).resolves({Subnets: []});

        await expect(network.defaultSubnetIds()).rejects.toMatchObject({
            category: 'Could not retrieve default subnet IDs'
        });
    });

    it('should find the default security group of the default VPC', async () => {
        ec2Mock.on(DescribeVpcsCommand).resolves({Vpcs: [{VpcId: MOCK_VPC_ID}]});
        ec2Mock.on(DescribeSecurityGroupsCommand).resolves({SecurityGroups: [{GroupId: MOCK_SECURITY_GROUP_ID}]});

        await expect(network.defaultSecurityGroupId()).resolves.toBe(MOCK_SECURITY_GROUP_ID);
        expect(ec2Mock.commandCalls(DescribeSecurityGroupsCommand)[0].args[0].input).toEqual({
            Filters: [
                {Name: 'group-name', Values: ['default']},
                {Name: 'vpc-id', Values: [MOCK_VPC_ID]}
            ]
        });
    });

    it('should resolve public IPs and security groups of network interfaces', async () => {
        ec2Mock.on(DescribeNetworkInterfacesCommand).resolves({
            NetworkInterfaces: [
                {
                    NetworkInterfaceId: 'eni-0abc1234',
                    Association: {PublicIp: '203.0.113.10'},
                    Groups: [{GroupId: MOCK_SECURITY_GROUP_ID}]
                },
                {NetworkInterfaceId: 'eni-0def5678'}
            ]
        });

        await expect(network.describeNetworkInterfaces(['eni-0abc1234', 'eni-0def5678'])).resolves.toEqual([
            {eniId: 'eni-0abc1234', publicIp: '203.0.113.10', securityGroupIds: [MOCK_SECURITY_GROUP_ID]},
            {eniId: 'eni-0def5678', publicIp: undefined, securityGroupIds: []}
        ]);
    });

    it('should not call EC2 for an empty interface list', async () => {
        await expect(network.describeNetworkInterfaces([])).resolves.toEqual([]);
        expect(ec2Mock.calls()).toHaveLength(0);
    });
});
