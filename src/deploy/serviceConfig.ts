import { EnvVar, LoadBalancerBinding, LoadBalancerKind, Port, Protocol, Rule, ServiceConfiguration } from "../types";
import { ValidationError } from "../utils/errors";
import {
  parseEnvVars,
  parsePort,
  parseRules,
  validateCpuAndMemory,
  validateServiceName,
} from "../utils/validation";
import { LoadBalancerService } from "../services/loadBalancer";

export const DEFAULT_CPU = "256";
export const DEFAULT_MEMORY = "512";

const REQUIRED_PROTOCOLS: Record<LoadBalancerKind, Protocol[]> = {
  network: ["TCP"],
  application: ["HTTP", "HTTPS"],
};

export type LoadBalancerLookup = Pick<LoadBalancerService, "describe">;

/**
 * Fails unless the port protocol is one the balancer kind accepts.
 */
export function checkLoadBalancerProtocol(name: string, kind: LoadBalancerKind, port: Port): void {
  const required = REQUIRED_PROTOCOLS[kind];

  if (!required.includes(port.protocol)) {
    throw new ValidationError("Invalid load balancer and protocol", [
      `${kind} load balancer ${name} requires ${required.join(" or ")} but the port is configured for ${port.protocol}`,
    ]);
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);

  for (const child of children) {
    if (typeof child === "object" && child !== null) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Collects and validates the flags of `service create`. Setters validate as
 * they go and only setLoadBalancer calls AWS. build() hands out a frozen
 * ServiceConfiguration.
 *
 * Call order matters: the port must be set before the load balancer, and the
 * load balancer before the rules.
 */
export class ServiceConfigBuilder {
  private cpu = DEFAULT_CPU;
  private memory = DEFAULT_MEMORY;
  private image?: string;
  private port?: Port;
  private loadBalancer?: LoadBalancerBinding;
  private rules: Rule[] = [];
  private envVars: EnvVar[] = [];

  constructor(private readonly name: string) {
    validateServiceName(name);
  }

  setCompute(cpu: string, memory: string): this {
    validateCpuAndMemory(cpu, memory);
    this.cpu = cpu;
    this.memory = memory;
    return this;
  }

  setPort(input?: string): this {
    this.port = input ? parsePort(input) : undefined;
    return this;
  }

  /**
   * Resolve the named load balancer and check it can carry the port's protocol.
   */
  async setLoadBalancer(name: string | undefined, lookup: LoadBalancerLookup): Promise<this> {
    if (!name) {
      this.loadBalancer = undefined;
      return this;
    }

    if (!this.port) {
      throw new ValidationError("Invalid load balancer and protocol", [
        `load balancer ${name} requires a port [specify --port]`,
      ]);
    }

    const description = await lookup.describe(name);
    checkLoadBalancerProtocol(name, description.kind, this.port);

    this.loadBalancer = { name, arn: description.arn, kind: description.kind };
    return this;
  }

  setRules(inputs: string[]): this {
    this.rules = parseRules(inputs, this.loadBalancer !== undefined);
    return this;
  }

  setEnvVars(inputs: string[]): this {
    this.envVars = parseEnvVars(inputs);
    return this;
  }

  setImage(image?: string): this {
    this.image = image || undefined;
    return this;
  }

  build(): Readonly<ServiceConfiguration> {
    const config: ServiceConfiguration = {
      name: this.name,
      cpu: this.cpu,
      memory: this.memory,
      rules: this.rules.map((rule) => ({ ...rule })),
      envVars: this.envVars.map((envVar) => ({ ...envVar })),
    };

    if (this.image) {
      config.image = this.image;
    }
    if (this.port) {
      config.port = { ...this.port };
    }
    if (this.loadBalancer) {
      config.loadBalancer = { ...this.loadBalancer };
    }

    return deepFreeze(config);
  }
}
