import { ECSClient } from '@aws-sdk/client-ecs';
import { EC2Client } from '@aws-sdk/client-ec2';
import { ElasticLoadBalancingV2Client } from '@aws-sdk/client-elastic-load-balancing-v2';
import { ECRClient } from '@aws-sdk/client-ecr';
import { IAMClient } from '@aws-sdk/client-iam';
import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { STSClient } from '@aws-sdk/client-sts';

/**
 * One set of regional AWS clients, created per CLI invocation and handed
 * explicitly to the services that need them.
 */
export interface AwsClients {
    ecs: ECSClient;
    ec2: EC2Client;
    elbv2: ElasticLoadBalancingV2Client;
    ecr: ECRClient;
    iam: IAMClient;
    logs: CloudWatchLogsClient;
    sts: STSClient;
}

export interface AwsClientOptions {
    region: string;
    profile?: string;
}

export function createAwsClients({ region, profile }: AwsClientOptions): AwsClients {
    const config = profile ? { region, profile } : { region };

    return {
        ecs: new ECSClient(config),
        ec2: new EC2Client(config),
        elbv2: new ElasticLoadBalancingV2Client(config),
        ecr: new ECRClient(config),
        iam: new IAMClient(config),
        logs: new CloudWatchLogsClient(config),
        sts: new STSClient(config)
    };
}
