/**
 * ================================================================================
 * TASK COMMANDS - Ad-hoc Task Groups
 * ================================================================================
 *
 * Task groups are sets of one-off tasks started together under one name.
 * ECS has no such concept; the name travels in each task's started-by tag.
 *
 * COMMANDS:
 * • task run <group>  - Start copies of a task definition
 * • task list         - Task groups and their instance counts
 * • task ps <group>   - Running tasks of a group
 * • task info <group> - Full details of a group's tasks
 * • task stop <group> - Stop some or all tasks of a group
 *
 * USAGE:
 * ecs-fleet task run migrate --task-definition arn:aws:ecs:...:task-definition/migrate:3
 * ecs-fleet task stop migrate --yes
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { Task } from '../types';
import { TaskStopError } from '../utils/errors';
import { logger } from '../utils/logger';
import { createContext, exitWithError, parsePositiveInteger } from './context';
import { TASK_TABLE_HEADERS, printTable, publicIpsByEni, taskRows, withSpinner } from './output';

interface RunOptions {
    taskDefinition: string;
    num: number;
    subnetId?: string[];
    securityGroupId?: string[];
}

interface SelectOptions {
    task?: string[];
}

interface StopOptions extends SelectOptions {
    yes?: boolean;
}

const runCommand = new Command('run')
    .description('Run new tasks from a task definition')
    .argument('<group>', 'Task group name')
    .requiredOption('--task-definition <arn>', 'Task definition family, family:revision or ARN to run')
    .option('-n, --num <count>', 'Number of task instances to run', parsePositiveInteger, 1)
    .option('--subnet-id <ids...>', 'Subnets to place tasks in (default: the default VPC subnets)')
    .option('--security-group-id <ids...>', 'Security groups to attach (default: the default VPC security group)')
    .action(async (group: string, options: RunOptions, command: Command) => {
        try {
            const context = await createContext(command);

            const taskArns = await withSpinner(`Running ${options.num} task(s) for ${group}`, () =>
                context.control.runTask({
                    taskGroupName: group,
                    taskDefinition: options.taskDefinition,
                    count: options.num,
                    subnetIds: options.subnetId,
                    securityGroupIds: options.securityGroupId
                })
            );

            logger.success(`Started ${taskArns.length} task(s) in group ${group}`);
            taskArns.forEach((arn) => logger.debug('Task started', { arn }));

        } catch (error) {
            exitWithError(`Failed to run tasks for ${group}`, error);
        }
    });

const listCommand = new Command('list')
    .description('List running task groups')
    .action(async (_options: object, command: Command) => {
        try {
            const context = await createContext(command);
            const groups = await withSpinner('Listing task groups', () => context.inventory.listTaskGroups());

            if (groups.length === 0) {
                logger.info('No task groups found');
                return;
            }

            printTable(['NAME', 'INSTANCES'], groups.map((group) => [group.taskGroupName, String(group.instances)]));

        } catch (error) {
            exitWithError('Failed to list task groups', error);
        }
    });

const psCommand = new Command('ps')
    .description('List the running tasks of a task group')
    .argument('<group>', 'Task group name')
    .action(async (group: string, _options: object, command: Command) => {
        try {
            const context = await createContext(command);

            const { tasks, publicIps } = await withSpinner(`Listing tasks for ${group}`, async () => {
                const tasks = await context.inventory.describeTasksForTaskGroup(group);
                return { tasks, publicIps: await publicIpsByEni(context.network, tasks) };
            });

            if (tasks.length === 0) {
                logger.info(`No tasks found in group ${group}`);
                return;
            }

            printTable(TASK_TABLE_HEADERS, taskRows(tasks, publicIps));

        } catch (error) {
            exitWithError(`Failed to list tasks for ${group}`, error);
        }
    });

const infoCommand = new Command('info')
    .description('Show details of the tasks in a task group')
    .argument('<group>', 'Task group name')
    .option('-t, --task <ids...>', 'Only these task IDs')
    .action(async (group: string, options: SelectOptions, command: Command) => {
        try {
            const context = await createContext(command);

            const { tasks, interfaces } = await withSpinner(`Describing tasks for ${group}`, async () => {
                const tasks = options.task?.length
                    ? await context.inventory.describeTasks(options.task)
                    : await context.inventory.describeTasksForTaskGroup(group);
                const interfaces = await context.network.describeNetworkInterfaces(
                    tasks.map((task) => task.eniId).filter((eniId) => eniId !== '')
                );
                return { tasks, interfaces };
            });

            if (tasks.length === 0) {
                logger.info(`No tasks found in group ${group}`);
                return;
            }

            console.log(chalk.bold(`\n📋 Task group ${group}: ${tasks.length} running\n`));

            for (const task of tasks) {
                const eni = interfaces.find((candidate) => candidate.eniId === task.eniId);

                console.log(chalk.bold(`Task ID: ${task.taskId}`));
                console.log(`  Image: ${task.image}`);
                console.log(`  Status: ${task.lastStatus} (desired ${task.desiredStatus})`);
                console.log(`  Started At: ${task.createdAt ? task.createdAt.toISOString() : 'N/A'}`);
                console.log(`  Task Definition Revision: ${task.deploymentId}`);
                console.log(`  CPU: ${task.cpu}`);
                console.log(`  Memory: ${task.memory}`);
                console.log(`  Task Role: ${task.taskRole || 'N/A'}`);
                console.log(`  Subnet: ${task.subnetId || 'N/A'}`);
                console.log(`  ENI: ${task.eniId || 'N/A'}`);
                console.log(`  Public IP: ${eni?.publicIp || 'N/A'}`);
                console.log(`  Security Groups: ${eni?.securityGroupIds.join(', ') || 'N/A'}`);

                if (task.envVars.length > 0) {
                    console.log('  Environment Variables:');
                    task.envVars.forEach(({ key, value }) => console.log(`    ${key}=${value}`));
                }
                console.log('');
            }

        } catch (error) {
            exitWithError(`Failed to describe tasks for ${group}`, error);
        }
    });

async function confirmStop(group: string, tasks: Task[]): Promise<boolean> {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([{
        type: 'confirm',
        name: 'confirmed',
        message: `Stop ${tasks.length} task(s) in group ${group}?`,
        default: false
    }]);
    return confirmed;
}

const stopCommand = new Command('stop')
    .description('Stop tasks in a task group')
    .argument('<group>', 'Task group name')
    .option('-t, --task <ids...>', 'Only these task IDs (default: every task in the group)')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (group: string, options: StopOptions, command: Command) => {
        try {
            const context = await createContext(command);
            const tasks = await withSpinner(`Finding tasks for ${group}`, () =>
                options.task?.length
                    ? context.inventory.describeTasks(options.task)
                    : context.inventory.describeTasksForTaskGroup(group)
            );

            if (tasks.length === 0) {
                logger.info(`No tasks found in group ${group}`);
                return;
            }

            if (!options.yes && !(await confirmStop(group, tasks))) {
                logger.info('Nothing stopped');
                return;
            }

            const stopped = await context.control.stopTasks(tasks.map((task) => task.taskId));
            logger.success(`Stopped ${stopped.length} task(s) in group ${group}`);

        } catch (error) {
            if (error instanceof TaskStopError) {
                logger.error(`Failed to stop task ${error.failed}`, error);
                console.log(`  Stopped: ${error.stopped.join(', ') || 'none'}`);
                console.log(`  Not attempted: ${error.remaining.join(', ') || 'none'}`);
                process.exit(1);
            }
            exitWithError(`Failed to stop tasks for ${group}`, error);
        }
    });

export const taskCommand = new Command('task')
    .description('Run and manage ad-hoc task groups')
    .addCommand(runCommand)
    .addCommand(listCommand)
    .addCommand(psCommand)
    .addCommand(infoCommand)
    .addCommand(stopCommand);
