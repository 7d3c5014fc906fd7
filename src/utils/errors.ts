/**
 * ================================================================================
 * ERRORS - Typed Failure Hierarchy
 * ================================================================================
 *
 * Every failure surfaced by ecs-fleet is a DeployerError carrying a short
 * human-readable category plus the underlying cause.
 *
 * TAXONOMY:
 * • ValidationError      - caller input failed local checks (all violations listed)
 * • RemoteOperationError - an AWS API call was rejected
 * • DeploymentError      - a deployment step failed, with the progress made so far
 * • TaskStopError        - a stop sequence was cut short
 */

import type { DeploymentProgress, DeploymentStep } from '../types';

export class DeployerError extends Error {
    readonly category: string;

    constructor(category: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.category = category;
    }
}

/**
 * Configuration errors. Raised before any remote call is made.
 */
export class ValidationError extends DeployerError {
    readonly violations: string[];

    constructor(category: string, violations: string[]) {
        super(category, violations.join(', '));
        this.violations = violations;
    }
}

export class RemoteOperationError extends DeployerError {
    constructor(category: string, cause: unknown) {
        super(category, describeCause(cause), { cause });
    }
}

export class DeploymentError extends DeployerError {
    readonly step: DeploymentStep;
    readonly progress: DeploymentProgress;
    readonly retryable: boolean;

    constructor(step: DeploymentStep, progress: DeploymentProgress, retryable: boolean, cause: unknown) {
        const category = cause instanceof DeployerError ? cause.category : `Deployment failed at step ${step}`;
        super(category, describeCause(cause), { cause });
        this.step = step;
        this.progress = progress;
        this.retryable = retryable;
    }
}

export class TaskStopError extends RemoteOperationError {
    readonly failed: string;
    readonly stopped: string[];
    readonly remaining: string[];           // Never attempted

    constructor(failed: string, stopped: string[], remaining: string[], cause: unknown) {
        super('Could not stop ECS task', cause);
        this.failed = failed;
        this.stopped = stopped;
        this.remaining = remaining;
    }
}

/**
 * Accumulates violations so every mistake is reported in one pass.
 */
export class Violations {
    private readonly messages: string[] = [];

    add(message: string): void {
        this.messages.push(message);
    }

    get isEmpty(): boolean {
        return this.messages.length === 0;
    }

    list(): string[] {
        return [...this.messages];
    }

    /**
     * Throw a ValidationError under the given category if anything was collected.
     */
    check(category: string): void {
        if (!this.isEmpty) {
            throw new ValidationError(category, this.list());
        }
    }
}

/**
 * Run an AWS call, converting any SDK failure into a RemoteOperationError.
 * Errors that are already typed pass through untouched.
 */
export async function remoteCall<T>(category: string, call: () => Promise<T>): Promise<T> {
    try {
        return await call();
    } catch (error) {
        if (error instanceof DeployerError) {
            throw error;
        }
        throw new RemoteOperationError(category, error);
    }
}

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) {
        return cause.message;
    }
    return String(cause);
}
