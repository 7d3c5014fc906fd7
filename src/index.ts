#!/usr/bin/env node

/**
 * ================================================================================
 * ECS-FLEET CLI - Entry Point
 * ================================================================================
 *
 * Deploys containerized services to AWS ECS on Fargate and runs, inspects and
 * stops ad-hoc task groups.
 *
 * GLOBAL OPTIONS:
 * • --region    - AWS region (default: $AWS_REGION or us-east-1)
 * • --profile   - AWS CLI profile (default: $AWS_PROFILE)
 * • --cluster   - ECS cluster (default: $ECS_FLEET_CLUSTER or fargate)
 * • --verbose   - Debug output on the console
 */

import { Command } from 'commander';
import dotenv from 'dotenv';
import { serviceCommand } from './commands/service';
import { taskCommand } from './commands/task';
import { GlobalOptions, exitWithError } from './commands/context';
import { logger } from './utils/logger';

dotenv.config();

const program = new Command();

program
    .name('ecs-fleet')
    .version('1.0.0')
    .description('Deploy and operate containerized services on AWS ECS Fargate')
    .option('--region <region>', 'AWS region')
    .option('--profile <profile>', 'AWS CLI profile to use')
    .option('--cluster <name>', 'ECS cluster to operate on')
    .option('-v, --verbose', 'Enable verbose logging')
    .hook('preAction', (thisCommand, actionCommand) => {
        if (thisCommand.opts<GlobalOptions>().verbose) {
            logger.setVerbose(true);
        }

        const path = [actionCommand.parent?.name(), actionCommand.name()].filter(Boolean).join(' ');
        logger.startExecution(path);
    });

program.addCommand(serviceCommand);
program.addCommand(taskCommand);

program.parseAsync(process.argv).catch((error: unknown) => exitWithError('Unexpected error', error));
