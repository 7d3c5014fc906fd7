import {
    CloudWatchLogsClient,
    CreateLogGroupCommand,
    ResourceAlreadyExistsException
} from '@aws-sdk/client-cloudwatch-logs';
import { logger } from '../utils/logger';
import { remoteCall } from '../utils/errors';

export const SERVICE_LOG_GROUP_PREFIX = '/fargate/service/';

export function serviceLogGroupName(serviceName: string): string {
    return `${SERVICE_LOG_GROUP_PREFIX}${serviceName}`;
}

/**
 * CloudWatch log groups receiving container output.
 */
export class LogGroupService {
    constructor(private readonly logs: CloudWatchLogsClient) {}

    /**
     * @returns the group name, whether it was created now or already existed
     */
    async createOrGetLogGroup(name: string): Promise<string> {
        return remoteCall('Could not create log group', async () => {
            try {
                await this.logs.send(new CreateLogGroupCommand({ logGroupName: name }));
                logger.debug('Log group created', { name });
            } catch (error) {
                if (!(error instanceof ResourceAlreadyExistsException)) {
                    throw error;
                }
                logger.debug('Log group already exists', { name });
            }
            return name;
        });
    }
}
