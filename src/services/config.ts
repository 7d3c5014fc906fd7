/**
 * ================================================================================
 * CONFIG SERVICE - Application Configuration Management
 * ================================================================================
 *
 * Resolves the region, profile and cluster every command runs against and
 * validates the AWS credentials before any remote work starts.
 *
 * RESOLUTION ORDER (first match wins):
 * • Global command line option (--region, --profile, --cluster)
 * • Environment variable (AWS_REGION, AWS_PROFILE, ECS_FLEET_CLUSTER), .env included
 * • Built-in default (us-east-1, default profile, "fargate")
 */

import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { logger } from '../utils/logger';
import { describeCause } from '../utils/errors';

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_CLUSTER = 'fargate';

export interface FleetConfig {
    region: string;         // AWS region for all operations
    clusterName: string;    // ECS cluster services and tasks live in
    profile?: string;       // AWS CLI profile name
    accountId?: string;     // Populated after credential validation
}

export interface ConfigOverrides {
    region?: string;
    profile?: string;
    cluster?: string;
}

export class ConfigService {
    private config: FleetConfig;

    constructor(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env) {
        this.config = {
            region: overrides.region || env.AWS_REGION || DEFAULT_REGION,
            clusterName: overrides.cluster || env.ECS_FLEET_CLUSTER || DEFAULT_CLUSTER,
            profile: overrides.profile || env.AWS_PROFILE || undefined
        };

        logger.debug('ConfigService initialized', {
            region: this.config.region,
            cluster: this.config.clusterName,
            profile: this.config.profile || 'default'
        });
    }

    /**
     * Validate AWS credentials and record the account ID
     *
     * //! CRITICAL: This must succeed before any AWS operations
     * //? Uses STS GetCallerIdentity, which every authenticated principal may call
     */
    async validateAWSCredentials(sts: STSClient): Promise<boolean> {
        const timer = logger.timer('credential-validation');

        try {
            const result = await sts.send(new GetCallerIdentityCommand({}));
            this.config.accountId = result.Account;

            timer.end();
            logger.debug('Credential validation successful', {
                accountId: result.Account,
                arn: result.Arn
            });
            return true;

        } catch (error) {
            timer.end();
            const message = describeCause(error);
            logger.error('AWS credentials validation failed. Please ensure your AWS CLI is configured.');
            logger.debug('Credential validation failed', { error: message, region: this.config.region });

            if (message.includes('Could not load credentials') || message.includes('Unable to locate credentials')) {
                logger.info('Hint: Run "aws configure" to set up your credentials');
            } else if (message.includes('Region')) {
                logger.info('Hint: Check that your AWS region is correctly configured');
            } else if (message.includes('expired')) {
                logger.info('Hint: Your AWS credentials may have expired - refresh them');
            }

            return false;
        }
    }

    getConfig(): FleetConfig {
        return { ...this.config };
    }

    getRegion(): string {
        return this.config.region;
    }

    getProfile(): string | undefined {
        return this.config.profile;
    }

    getClusterName(): string {
        return this.config.clusterName;
    }

    getAccountId(): string | undefined {
        return this.config.accountId;
    }

    isConfigured(): boolean {
        return !!this.config.accountId;
    }
}
