/**
 * ================================================================================
 * COMMAND CONTEXT - Shared Wiring for Every Command
 * ================================================================================
 *
 * Resolves the global options, runs the credential preflight and builds the
 * AWS clients and services a command works with. Also the single place where
 * commands turn a failure into a console report and exit status 1.
 */

import { Command, InvalidArgumentError } from 'commander';
import { AwsClients, createAwsClients } from '../aws/clients';
import {
    ConfigService,
    EcsService,
    IamService,
    ImageRepositoryService,
    LoadBalancerService,
    LogGroupService,
    NetworkService
} from '../services';
import { TaskInventory } from '../fleet/inventory';
import { TaskControl } from '../fleet/control';
import { DeployerError, RemoteOperationError } from '../utils/errors';
import { logger } from '../utils/logger';

// A type alias, so it satisfies commander's OptionValues index signature
export type GlobalOptions = {
    region?: string;
    profile?: string;
    cluster?: string;
    verbose?: boolean;
};

export interface FleetContext {
    config: ConfigService;
    clients: AwsClients;
    ecs: EcsService;
    network: NetworkService;
    loadBalancers: LoadBalancerService;
    repositories: ImageRepositoryService;
    iam: IamService;
    logGroups: LogGroupService;
    inventory: TaskInventory;
    control: TaskControl;
}

/**
 * Build the context for a command and validate the AWS credentials.
 *
 * //! Exits the process when the credentials do not work
 */
export async function createContext(command: Command): Promise<FleetContext> {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const config = new ConfigService({
        region: globals.region,
        profile: globals.profile,
        cluster: globals.cluster
    });

    const clients = createAwsClients({ region: config.getRegion(), profile: config.getProfile() });

    if (!(await config.validateAWSCredentials(clients.sts))) {
        process.exit(1);
    }

    const ecs = new EcsService(clients.ecs, config.getClusterName());
    const network = new NetworkService(clients.ec2);

    return {
        config,
        clients,
        ecs,
        network,
        loadBalancers: new LoadBalancerService(clients.elbv2),
        repositories: new ImageRepositoryService(clients.ecr),
        iam: new IamService(clients.iam),
        logGroups: new LogGroupService(clients.logs),
        inventory: new TaskInventory(ecs),
        control: new TaskControl(ecs, network)
    };
}

/**
 * Report a failed command and exit with status 1.
 */
export function exitWithError(message: string, error: unknown): never {
    logger.error(message, error);

    if (error instanceof RemoteOperationError) {
        const cause = error.cause instanceof Error ? error.cause.name : '';
        if (cause === 'AccessDeniedException' || cause === 'AccessDenied' || cause === 'UnauthorizedOperation') {
            logger.info('Hint: Check that your IAM user or role has permission for this operation');
        } else if (cause === 'ClusterNotFoundException') {
            logger.info('Hint: Create the cluster first or choose another one with --cluster');
        }
    } else if (!(error instanceof DeployerError)) {
        logger.info(`Hint: Re-run with --verbose and check ${logger.getLogFilePath()} for details`);
    }

    process.exit(1);
}

/**
 * commander option parser for whole numbers greater than zero.
 */
export function parsePositiveInteger(value: string): number {
    const parsed = Number(value);

    if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a whole number greater than zero.');
    }
    return parsed;
}
