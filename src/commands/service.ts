/**
 * ================================================================================
 * SERVICE COMMANDS - Create and Inspect Fargate Services
 * ================================================================================
 *
 * COMMANDS:
 * • service create <name> - Provision resources and start a one-task service
 * • service ps <name>     - List the running tasks of a service
 *
 * USAGE:
 * ecs-fleet service create web --port http:80 --lb public --rule path=/api/*
 * ecs-fleet service create web --image nginx:1.25 --dry-run
 * ecs-fleet service ps web
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DeploymentPlan, DeploymentProgress } from '../types';
import { DEFAULT_CPU, DEFAULT_MEMORY, ServiceConfigBuilder } from '../deploy/serviceConfig';
import { DeploymentOrchestrator, planDeployment } from '../deploy/orchestrator';
import { DockerCli } from '../docker/imagePublisher';
import { GitRevisionSource } from '../git/revision';
import { logger } from '../utils/logger';
import { createContext, exitWithError, parsePositiveInteger } from './context';
import { TASK_TABLE_HEADERS, printTable, publicIpsByEni, taskRows, withSpinner } from './output';

export interface CreateOptions {
    cpu: string;
    memory: string;
    env?: string[];
    port?: string;
    image?: string;
    lb?: string;
    rule?: string[];
    dryRun?: boolean;
    timeout?: number;
}

/**
 * Apply every option that can be checked without calling AWS. Rules are
 * applied here too when no load balancer was named, since they are then
 * invalid on their own.
 */
export function localServiceConfig(name: string, options: CreateOptions): ServiceConfigBuilder {
    const builder = new ServiceConfigBuilder(name)
        .setCompute(options.cpu, options.memory)
        .setPort(options.port)
        .setEnvVars(options.env ?? [])
        .setImage(options.image);

    if (!options.lb) {
        builder.setRules(options.rule ?? []);
    }
    return builder;
}

function printPlan(plan: DeploymentPlan): void {
    console.log(chalk.bold(`\n📋 Deployment plan for ${plan.serviceName}:\n`));

    plan.steps.forEach((step, index) => {
        const marker = step.action === 'run' ? chalk.green('run ') : chalk.gray('skip');
        console.log(`  ${index + 1}. [${marker}] ${step.step}: ${step.detail}`);
    });
    console.log('');
}

function printProgress(progress: DeploymentProgress): void {
    const entries: Array<[string, string | undefined]> = [
        ['Repository', progress.repositoryUri],
        ['Subnets', progress.subnetIds?.join(', ')],
        ['Execution role', progress.executionRoleArn],
        ['Log group', progress.logGroupName],
        ['Image', progress.image],
        ['Target group', progress.targetGroupArn],
        ['Listener rules', progress.ruleArns?.join(', ')],
        ['Default action on', progress.defaultActionListenerArns?.join(', ')],
        ['Task definition', progress.taskDefinitionArn],
        ['Service', progress.serviceArn]
    ];

    for (const [label, value] of entries) {
        if (value) {
            console.log(`  ${label}: ${value}`);
        }
    }
}

const createCommand = new Command('create')
    .description('Create and deploy a new service')
    .argument('<name>', 'Service name')
    .option('-c, --cpu <units>', 'CPU units to allocate for each task', DEFAULT_CPU)
    .option('-m, --memory <mib>', 'MiB of memory to allocate for each task', DEFAULT_MEMORY)
    .option('-e, --env <pairs...>', 'Environment variables to set [e.g. KEY=value]')
    .option('-p, --port <port>', 'Port to listen on [e.g. 80, http:8080, https:8443, tcp:1935]')
    .option('-i, --image <image>', 'Image to run; if omitted, one is built from the Dockerfile in the current directory')
    .option('-l, --lb <name>', 'Name of a load balancer to use')
    .option('-r, --rule <rules...>', 'Routing rules [e.g. host=api.example.com, path=/api/*]; if omitted the service becomes the default route')
    .option('--dry-run', 'Print the deployment plan without creating anything')
    .option('--timeout <seconds>', 'Give up after this many seconds', parsePositiveInteger)
    .action(async (name: string, options: CreateOptions, command: Command) => {
        try {
            const builder = localServiceConfig(name, options);

            const context = await createContext(command);
            if (options.lb) {
                await builder.setLoadBalancer(options.lb, context.loadBalancers);
                builder.setRules(options.rule ?? []);
            }
            const config = builder.build();

            logger.debug('Service configuration', config);

            if (options.dryRun) {
                printPlan(planDeployment(config));
                return;
            }

            logger.info(`Creating ${name}`);

            const orchestrator = new DeploymentOrchestrator({
                repositories: context.repositories,
                network: context.network,
                iam: context.iam,
                logGroups: context.logGroups,
                loadBalancers: context.loadBalancers,
                ecs: context.ecs,
                publisher: new DockerCli(),
                revisions: new GitRevisionSource(),
                region: context.config.getRegion()
            });

            const signal = options.timeout ? AbortSignal.timeout(options.timeout * 1000) : undefined;
            const result = await orchestrator.deploy(config, { signal });

            if (!result.ok) {
                const { error } = result;
                logger.error(`Failed to create service ${name} at step ${error.step}`, error);

                console.log(chalk.bold('\nCreated before the failure:'));
                printProgress(error.progress);
                if (error.retryable) {
                    logger.info('Nothing irreversible was changed; it is safe to re-run this command');
                } else {
                    logger.warn('Listener routing or the service already exists; clean these up before re-running');
                }
                process.exit(1);
            }

            logger.success(`Created service ${name}`);
            printProgress(result.deployment.progress);

        } catch (error) {
            exitWithError(`Failed to create service ${name}`, error);
        }
    });

const psCommand = new Command('ps')
    .description('List the running tasks of a service')
    .argument('<name>', 'Service name')
    .action(async (name: string, _options: object, command: Command) => {
        try {
            const context = await createContext(command);

            const { tasks, publicIps } = await withSpinner(`Listing tasks for ${name}`, async () => {
                const tasks = await context.inventory.describeTasksForService(name);
                return { tasks, publicIps: await publicIpsByEni(context.network, tasks) };
            });

            if (tasks.length === 0) {
                logger.info(`No tasks found for service ${name}`);
                return;
            }

            printTable(TASK_TABLE_HEADERS, taskRows(tasks, publicIps));

        } catch (error) {
            exitWithError(`Failed to list tasks for service ${name}`, error);
        }
    });

export const serviceCommand = new Command('service')
    .description('Create and inspect services')
    .addCommand(createCommand)
    .addCommand(psCommand);
