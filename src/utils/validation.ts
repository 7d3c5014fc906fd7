/**
 * ================================================================================
 * VALIDATION UTILITY - Command Line Input Validation
 * ================================================================================
 *
 * Parsers and validators for everything a user types on the command line
 * before a deployment or task run. Each validator collects every violation
 * into a Violations accumulator and throws a single ValidationError at the
 * end, so all mistakes are reported in one pass.
 *
 * KEY FEATURES:
 * • Port Parsing      - [protocol:]port with protocol and range checks
 * • Rule Parsing      - type=value load balancer routing rules
 * • Compute Shape     - Fargate CPU/memory combinations
 * • Env Vars          - KEY=value pairs with unique keys
 * • Duration Display  - Human-readable running time
 */

import { EnvVar, Port, PROTOCOLS, Protocol, Rule, RuleType } from '../types';
import { ValidationError, Violations } from './errors';

const VALID_SERVICE_NAME = /^[A-Za-z][A-Za-z0-9_-]{0,254}$/;

/**
 * ================================================================
 * PORTS
 * ================================================================
 */

function toProtocol(value: string): Protocol | undefined {
    return PROTOCOLS.find((protocol) => protocol === value.toUpperCase());
}

/**
 * Parse a port expression such as "80", "http:8080" or "TCP:1935".
 *
 * @throws ValidationError listing every violated rule
 */
export function parsePort(input: string): Port {
    const violations = new Violations();
    const parts = input.trim().split(':');

    if (parts.length > 2) {
        violations.add(`Invalid port expression ${input} [specify PORT or PROTOCOL:PORT]`);
        throw new ValidationError('Invalid command line flags', violations.list());
    }

    const [protocolPart, portPart] = parts.length === 2 ? parts : ['TCP', parts[0]];
    const protocol = toProtocol(protocolPart);
    const port = /^\d+$/.test(portPart) ? Number(portPart) : NaN;

    if (!protocol) {
        violations.add(`Invalid protocol ${protocolPart.toUpperCase()} [specify TCP, HTTP, or HTTPS]`);
    }

    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        violations.add(`Invalid port ${portPart} [specify within 1 - 65535]`);
    }

    if (protocol && violations.isEmpty) {
        return { protocol, port };
    }
    throw new ValidationError('Invalid command line flags', violations.list());
}

/**
 * ================================================================
 * LOAD BALANCER RULES
 * ================================================================
 */

function toRuleType(value: string): RuleType | undefined {
    const upper = value.toUpperCase();
    return upper === 'HOST' || upper === 'PATH' ? upper : undefined;
}

/**
 * Parse routing rules of the form type=value.
 *
 * @param loadBalancerConfigured - rules are only meaningful with a load balancer
 */
export function parseRules(inputs: string[], loadBalancerConfigured: boolean): Rule[] {
    const violations = new Violations();
    const rules: Rule[] = [];

    if (inputs.length > 0 && !loadBalancerConfigured) {
        violations.add('lb must be configured if rules are specified');
    }

    for (const input of inputs) {
        const parts = input.split('=');

        if (parts.length !== 2) {
            violations.add(`rules must be in the form of type=value [got ${input}]`);
            continue;
        }

        const [rawType, value] = parts;
        const type = toRuleType(rawType);

        if (!type) {
            violations.add(`Invalid rule type ${rawType} [must be path or host]`);
            continue;
        }

        rules.push({ type, value });
    }

    violations.check('Invalid rule');
    return rules;
}

/**
 * ================================================================
 * COMPUTE SHAPE
 * ================================================================
 */

/**
 * Fargate CPU units and the memory sizes (MiB) each one accepts.
 */
const FARGATE_MEMORY_BY_CPU: Record<string, number[]> = {
    '256': [512, 1024, 2048],
    '512': range(1024, 4096, 1024),
    '1024': range(2048, 8192, 1024),
    '2048': range(4096, 16384, 1024),
    '4096': range(8192, 30720, 1024)
};

function range(from: number, to: number, step: number): number[] {
    const values: number[] = [];
    for (let value = from; value <= to; value += step) {
        values.push(value);
    }
    return values;
}

export function validateCpuAndMemory(cpu: string, memory: string): void {
    const violations = new Violations();
    const allowed = FARGATE_MEMORY_BY_CPU[cpu];

    if (!allowed) {
        violations.add(`Invalid CPU units ${cpu} [specify ${Object.keys(FARGATE_MEMORY_BY_CPU).join(', ')}]`);
    } else if (!/^\d+$/.test(memory) || !allowed.includes(Number(memory))) {
        violations.add(`Invalid memory ${memory} for ${cpu} CPU units [specify ${describeMemory(allowed)} MiB]`);
    }

    violations.check(`Invalid settings: ${cpu} CPU units / ${memory} MiB`);
}

function describeMemory(allowed: number[]): string {
    if (allowed.length <= 3) {
        return allowed.join(', ');
    }
    return `${allowed[0]} - ${allowed[allowed.length - 1]} in increments of ${allowed[1] - allowed[0]}`;
}

/**
 * ================================================================
 * ENVIRONMENT VARIABLES AND NAMES
 * ================================================================
 */

/**
 * Parse KEY=value pairs. Keys are upper-cased; the value may itself contain '='.
 */
export function parseEnvVars(inputs: string[]): EnvVar[] {
    const violations = new Violations();
    const envVars: EnvVar[] = [];
    const seen = new Set<string>();

    for (const input of inputs) {
        const separator = input.indexOf('=');

        if (separator <= 0) {
            violations.add(`${input} must be in the form of KEY=value`);
            continue;
        }

        const key = input.slice(0, separator).toUpperCase();

        if (seen.has(key)) {
            violations.add(`Duplicate environment variable ${key}`);
            continue;
        }

        seen.add(key);
        envVars.push({ key, value: input.slice(separator + 1) });
    }

    violations.check('Invalid environment variable');
    return envVars;
}

export function validateServiceName(name: string): void {
    const violations = new Violations();

    if (!VALID_SERVICE_NAME.test(name)) {
        violations.add(`Invalid name ${JSON.stringify(name)} [must start with a letter and contain only letters, numbers, hyphens and underscores]`);
    }

    violations.check('Invalid service name');
}

/**
 * ================================================================
 * DISPLAY FORMATTING
 * ================================================================
 */

/**
 * Format a whole number of seconds, e.g. "2d 5h 30m", "3h 4m 5s", "12s".
 */
export function formatDuration(totalSeconds: number): string {
    const days = Math.floor(totalSeconds / 86400);
    const hours = Math.floor((totalSeconds % 86400) / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = totalSeconds % 60;

    if (days > 0) {
        return `${days}d ${hours}h ${minutes}m`;
    } else if (hours > 0) {
        return `${hours}h ${minutes}m ${seconds}s`;
    } else if (minutes > 0) {
        return `${minutes}m ${seconds}s`;
    }
    return `${seconds}s`;
}
