/**
 * ================================================================================
 * LOGGER UTILITY - Structured Logging and Monitoring
 * ================================================================================
 *
 * Console output for the operator plus JSON file logging for later analysis.
 * Every record written to file carries the execution ID of the command that
 * produced it.
 *
 * LOG LEVELS:
 * • ERROR - Failed operations, with category and cause
 * • WARN  - Non-critical issues
 * • INFO  - General operational information
 * • DEBUG - Diagnostic detail (console only in verbose mode)
 *
 * OUTPUT DESTINATIONS:
 * • Console - Coloured output via chalk, spinners via ora
 * • File    - winston JSON records, ecs-fleet.log or $ECS_FLEET_LOG_FILE
 */

import winston from 'winston';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { randomUUID } from 'crypto';
import path from 'path';
import { DeployerError, ValidationError, describeCause } from './errors';

export class Logger {
    private winston: winston.Logger;          // Winston instance for file logging
    private verbose: boolean = false;
    private silent: boolean = false;
    private executionId: string = '';
    private logFilePath: string;

    constructor() {
        this.logFilePath = path.resolve(process.cwd(), process.env.ECS_FLEET_LOG_FILE || 'ecs-fleet.log');

        this.winston = winston.createLogger({
            level: 'info',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            transports: [
                new winston.transports.File({ filename: this.logFilePath })
            ]
        });
    }

    /**
     * Enable or disable verbose mode. Verbose shows debug and step records
     * on the console and lowers the file level to debug.
     */
    setVerbose(verbose: boolean): void {
        this.verbose = verbose;
        this.winston.level = verbose ? 'debug' : 'info';
        this.debug('Verbose logging enabled');
    }

    /**
     * Silence console, spinner and file output alike.
     */
    setSilent(silent: boolean): void {
        this.silent = silent;
        this.winston.silent = silent;
    }

    /**
     * Start a new execution session with a unique tracking ID
     *
     * //? First 8 characters of the UUID prefix every console line
     */
    startExecution(command: string): string {
        this.executionId = randomUUID();

        this.print(chalk.cyan('🚀'), chalk.bold(`Execution ID: ${this.executionId}`));
        this.print(chalk.gray('📄'), `Log file: ${this.logFilePath}`);
        this.print('');

        this.winston.info(`Starting execution: ${command}`, {
            executionId: this.executionId,
            command
        });
        return this.executionId;
    }

    private formatMessage(message: string): string {
        return this.executionId ? `[${this.executionId.slice(0, 8)}] ${message}` : message;
    }

    private print(...parts: string[]): void {
        if (!this.silent) {
            console.log(...parts);
        }
    }

    /**
     * ================================================================================
     * LOGGING METHODS
     * ================================================================================
     */

    info(message: string, data?: unknown): void {
        this.print(chalk.blue('ℹ'), this.formatMessage(message));
        this.winston.info(message, { executionId: this.executionId, data });
    }

    success(message: string, data?: unknown): void {
        this.print(chalk.green('✓'), this.formatMessage(message));
        this.winston.info(message, { executionId: this.executionId, data, level: 'success' });
    }

    warn(message: string, data?: unknown): void {
        this.print(chalk.yellow('⚠'), this.formatMessage(message));
        this.winston.warn(message, { executionId: this.executionId, data });
    }

    /**
     * Log an error message, with the cause when one is given.
     *
     * //! Stack traces go to the file always, to the console only in verbose mode
     */
    error(message: string, error?: unknown, data?: unknown): void {
        this.print(chalk.red('✗'), this.formatMessage(message));

        if (error === undefined) {
            this.winston.error(message, { executionId: this.executionId, data });
            return;
        }

        if (error instanceof ValidationError) {
            this.print(chalk.red(`  ${error.category}`));
            for (const violation of error.violations) {
                this.print(chalk.red(`  • ${violation}`));
            }
        } else if (error instanceof DeployerError) {
            this.print(chalk.red(`  ${error.category}: ${error.message}`));
        } else {
            this.print(chalk.red(`  ${describeCause(error)}`));
        }
        const stack = error instanceof Error ? error.stack : undefined;
        if (this.verbose && stack) {
            this.print(chalk.gray(stack));
        }
        this.winston.error(message, {
            executionId: this.executionId,
            error: stack ?? describeCause(error),
            category: error instanceof DeployerError ? error.category : undefined,
            data
        });
    }

    debug(message: string, data?: unknown): void {
        if (this.verbose) {
            this.print(chalk.gray('🔍'), chalk.gray(this.formatMessage(message)));
            if (data !== undefined) {
                this.print(chalk.gray('   Data:'), chalk.gray(JSON.stringify(data, null, 2)));
            }
        }
        this.winston.debug(message, { executionId: this.executionId, data });
    }

    /**
     * Log a workflow step (e.g. 'DEPLOY_REPOSITORY').
     *
     * //? Only shown in verbose mode to reduce console noise
     */
    step(step: string, message: string, data?: unknown): void {
        if (this.verbose) {
            this.print(chalk.magenta('📋'), chalk.magenta(this.formatMessage(`${step}: ${message}`)));
            if (data !== undefined) {
                this.print(chalk.gray('   Data:'), chalk.gray(JSON.stringify(data, null, 2)));
            }
        }

        this.winston.info(`${step}: ${message}`, {
            executionId: this.executionId,
            step,
            data,
            type: 'step'
        });
    }

    /**
     * ================================================================================
     * UTILITY METHODS
     * ================================================================================
     */

    timer(label: string): { end: () => number } {
        const startTime = Date.now();
        this.debug(`Timer started: ${label}`);

        return {
            end: () => {
                const duration = Date.now() - startTime;
                this.debug(`Timer ended: ${label} (${duration}ms)`, { duration, label });
                return duration;
            }
        };
    }

    /**
     * //? Remember to call .succeed(), .fail(), or .stop() when done
     */
    spinner(message: string): Ora {
        return ora({ text: this.formatMessage(message), isSilent: this.silent }).start();
    }

    getExecutionId(): string {
        return this.executionId;
    }

    getLogFilePath(): string {
        return this.logFilePath;
    }
}

export const logger = new Logger();
