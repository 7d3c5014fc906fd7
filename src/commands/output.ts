import chalk from 'chalk';
import { Task } from '../types';
import { NetworkService } from '../services/network';
import { runningFor } from '../fleet/inventory';
import { formatDuration } from '../utils/validation';
import { logger } from '../utils/logger';

export const TASK_TABLE_HEADERS = ['ID', 'IMAGE', 'STATUS', 'RUNNING', 'IP', 'CPU', 'MEMORY', 'DEPLOYMENT'];

/**
 * Render rows as left-aligned columns separated by three spaces.
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
    const widths = headers.map((header, column) =>
        Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
    );
    const line = (cells: string[]) =>
        cells.map((cell, column) => cell.padEnd(widths[column])).join('   ').trimEnd();

    return [line(headers), ...rows.map(line)];
}

export function printTable(headers: string[], rows: string[][]): void {
    const [header, ...lines] = formatTable(headers, rows);

    console.log(chalk.bold(header));
    lines.forEach((line) => console.log(line));
}

/**
 * Public IPs of the tasks' network interfaces, keyed by ENI id.
 */
export async function publicIpsByEni(network: NetworkService, tasks: Task[]): Promise<Map<string, string>> {
    const eniIds = tasks.map((task) => task.eniId).filter((eniId) => eniId !== '');
    const interfaces = await network.describeNetworkInterfaces(eniIds);

    return new Map(interfaces.map((eni) => [eni.eniId, eni.publicIp ?? '']));
}

export function taskRows(tasks: Task[], publicIps: Map<string, string>, now: Date = new Date()): string[][] {
    return tasks.map((task) => [
        task.taskId,
        task.image,
        task.lastStatus,
        formatDuration(runningFor(task, now)),
        publicIps.get(task.eniId) ?? '',
        task.cpu,
        task.memory,
        task.deploymentId
    ]);
}

/**
 * Run remote work behind a spinner that is stopped however the work ends.
 */
export async function withSpinner<T>(message: string, work: () => Promise<T>): Promise<T> {
    const spinner = logger.spinner(message);

    try {
        return await work();
    } finally {
        spinner.stop();
    }
}
