/**
 * ================================================================================
 * DEPLOYMENT ORCHESTRATOR - service create
 * ================================================================================
 *
 * Turns a validated ServiceConfiguration into a running Fargate service:
 *
 *   repository -> network -> executionRole -> logGroup -> image
 *     -> loadBalancer -> taskDefinition -> service
 *
 * Steps run strictly in order and the first failure stops the sequence.
 * Nothing is rolled back; the failure carries everything created so far.
 */

import {
  Deployment,
  DeploymentPlan,
  DeploymentProgress,
  DeploymentStep,
  PlannedStep,
  ServiceConfiguration,
} from "../types";
import { DeploymentError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ImageRepositoryService } from "../services/ecr";
import { NetworkService } from "../services/network";
import { IamService, EXECUTION_ROLE_NAME } from "../services/iam";
import { LogGroupService, serviceLogGroupName } from "../services/logs";
import { LoadBalancerService } from "../services/loadBalancer";
import { EcsService } from "../services/ecs";
import { ImagePublisher, generateTag, imageUri } from "../docker/imagePublisher";
import { RevisionSource } from "../git/revision";

export type DeploymentResult =
  | { ok: true; deployment: Deployment }
  | { ok: false; error: DeploymentError };

export interface DeployOptions {
  signal?: AbortSignal;
}

export interface OrchestratorDependencies {
  repositories: ImageRepositoryService;
  network: NetworkService;
  iam: IamService;
  logGroups: LogGroupService;
  loadBalancers: LoadBalancerService;
  ecs: EcsService;
  publisher: ImagePublisher;
  revisions: RevisionSource;
  region: string;
  now?: () => Date;
}

const STEP_ORDER: DeploymentStep[] = [
  "repository",
  "network",
  "executionRole",
  "logGroup",
  "image",
  "loadBalancer",
  "taskDefinition",
  "service",
];

// Re-running after these have completed would attach rules or create the service twice
const NON_IDEMPOTENT_STEPS: ReadonlySet<DeploymentStep> = new Set<DeploymentStep>(["loadBalancer", "service"]);

export function targetGroupName(loadBalancerName: string, serviceName: string): string {
  return `${loadBalancerName}-${serviceName}`;
}

function stepLabel(step: DeploymentStep): string {
  return `DEPLOY_${step.replace(/[A-Z]/g, (letter) => `_${letter}`).toUpperCase()}`;
}

function describeStep(step: DeploymentStep, config: ServiceConfiguration): PlannedStep {
  const run = (detail: string): PlannedStep => ({ step, action: "run", detail });
  const skip = (detail: string): PlannedStep => ({ step, action: "skip", detail });

  switch (step) {
    case "repository":
      return run(`use or create ECR repository ${config.name}`);
    case "network":
      return run("place tasks in the default VPC subnets");
    case "executionRole":
      return run(`use or create IAM role ${EXECUTION_ROLE_NAME}`);
    case "logGroup":
      return run(`use or create log group ${serviceLogGroupName(config.name)}`);
    case "image":
      return config.image
        ? skip(`use image ${config.image}`)
        : run("build and push an image from the current directory");
    case "loadBalancer": {
      if (!config.loadBalancer) {
        return skip("no load balancer");
      }
      const targetGroup = targetGroupName(config.loadBalancer.name, config.name);
      return config.rules.length > 0
        ? run(`create target group ${targetGroup} and add ${config.rules.length} listener rule(s)`)
        : run(`create target group ${targetGroup} and make it the default action`);
    }
    case "taskDefinition":
      return run(`register task definition ${config.name} (${config.cpu} CPU units / ${config.memory} MiB)`);
    case "service":
      return run(`create service ${config.name} with 1 task`);
  }
}

/**
 * Decide what a deployment of this configuration would do, without calling AWS.
 */
export function planDeployment(config: ServiceConfiguration): DeploymentPlan {
  const plan: DeploymentPlan = {
    serviceName: config.name,
    steps: STEP_ORDER.map((step) => describeStep(step, config)),
  };

  if (config.loadBalancer) {
    plan.routing = config.rules.length > 0 ? "rules" : "default-action";
  }
  return plan;
}

/**
 * Re-running is safe while the failed step can be repeated and nothing
 * non-repeatable (listener rules, default actions, the service) exists yet.
 */
export function isRetryable(step: DeploymentStep, progress: DeploymentProgress): boolean {
  const routed = (progress.ruleArns?.length ?? 0) > 0 || (progress.defaultActionListenerArns?.length ?? 0) > 0;
  const completedNonIdempotent = progress.completed.some((completed) => NON_IDEMPOTENT_STEPS.has(completed));

  return step !== "service" && !routed && !completedNonIdempotent && progress.serviceArn === undefined;
}

function required<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new Error(`${what} is not available`);
  }
  return value;
}

export class DeploymentOrchestrator {
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async deploy(config: ServiceConfiguration, options: DeployOptions = {}): Promise<DeploymentResult> {
    const { signal } = options;
    const plan = planDeployment(config);
    const progress: DeploymentProgress = { completed: [] };

    for (const planned of plan.steps) {
      if (planned.action === "skip") {
        logger.step(stepLabel(planned.step), `skipped: ${planned.detail}`);
        continue;
      }

      try {
        signal?.throwIfAborted();
        logger.step(stepLabel(planned.step), planned.detail);
        await this.runStep(planned.step, config, progress, signal);
        progress.completed.push(planned.step);
      } catch (error) {
        const snapshot = structuredClone(progress);
        const failure = new DeploymentError(planned.step, snapshot, isRetryable(planned.step, snapshot), error);

        logger.step(stepLabel(planned.step), "failed", { error: failure.message, progress: snapshot });
        return { ok: false, error: failure };
      }
    }

    return { ok: true, deployment: { plan, progress } };
  }

  private async runStep(
    step: DeploymentStep,
    config: ServiceConfiguration,
    progress: DeploymentProgress,
    signal?: AbortSignal,
  ): Promise<void> {
    const { deps } = this;

    switch (step) {
      case "repository":
        progress.repositoryUri = await deps.repositories.acquire(config.name);
        return;

      case "network":
        progress.subnetIds = await deps.network.defaultSubnetIds();
        return;

      case "executionRole":
        progress.executionRoleArn = await deps.iam.createOrGetExecutionRole();
        return;

      case "logGroup":
        progress.logGroupName = await deps.logGroups.createOrGetLogGroup(serviceLogGroupName(config.name));
        return;

      case "image":
        progress.image = await this.publishImage(required(progress.repositoryUri, "Repository URI"), signal);
        return;

      case "loadBalancer":
        await this.wireLoadBalancer(config, progress, signal);
        return;

      case "taskDefinition":
        progress.taskDefinitionArn = await deps.ecs.registerTaskDefinition({
          family: config.name,
          cpu: config.cpu,
          memory: config.memory,
          executionRoleArn: required(progress.executionRoleArn, "Execution role"),
          image: required(config.image ?? progress.image, "Image"),
          port: config.port?.port,
          envVars: config.envVars,
          logGroupName: required(progress.logGroupName, "Log group"),
          logRegion: deps.region,
        });
        return;

      case "service":
        progress.serviceArn = await deps.ecs.createService({
          name: config.name,
          taskDefinitionArn: required(progress.taskDefinitionArn, "Task definition"),
          subnetIds: required(progress.subnetIds, "Subnets"),
          targetGroupArn: progress.targetGroupArn,
          port: config.port?.port,
        });
        return;
    }
  }

  /**
   * Tag with the git revision when there is one, otherwise a UTC timestamp.
   */
  private async publishImage(repositoryUri: string, signal?: AbortSignal): Promise<string> {
    const { repositories, revisions, publisher } = this.deps;

    const credentials = await repositories.credentials();
    signal?.throwIfAborted();

    const tag = (await revisions.shortRevision()) ?? generateTag(this.now());
    const image = imageUri(repositoryUri, tag);

    await publisher.login(repositoryUri, credentials);
    signal?.throwIfAborted();
    await publisher.build(image);
    signal?.throwIfAborted();
    await publisher.push(image);

    return image;
  }

  private async wireLoadBalancer(
    config: ServiceConfiguration,
    progress: DeploymentProgress,
    signal?: AbortSignal,
  ): Promise<void> {
    const { network, loadBalancers } = this.deps;
    const binding = required(config.loadBalancer, "Load balancer");
    const port = required(config.port, "Port");

    const vpcId = await network.defaultVpcId();
    signal?.throwIfAborted();

    const targetGroupArn = await loadBalancers.createTargetGroup({
      name: targetGroupName(binding.name, config.name),
      port: port.port,
      protocol: port.protocol,
      vpcId,
    });
    progress.targetGroupArn = targetGroupArn;

    if (config.rules.length > 0) {
      const ruleArns: string[] = [];
      progress.ruleArns = ruleArns;

      for (const rule of config.rules) {
        await loadBalancers.addRule(binding.arn, targetGroupArn, rule, {
          signal,
          onApplied: (arn) => ruleArns.push(arn),
        });
      }
      return;
    }

    const listenerArns: string[] = [];
    progress.defaultActionListenerArns = listenerArns;

    await loadBalancers.setDefaultAction(binding.arn, targetGroupArn, {
      signal,
      onApplied: (arn) => listenerArns.push(arn),
    });
  }
}
