/**
 * ================================================================================
 * TYPE DEFINITIONS - Core Data Structures
 * ================================================================================
 *
 * Central type definitions for ecs-fleet. These interfaces describe the
 * validated service configuration consumed by the deployment orchestrator,
 * the task projections produced by the fleet inventory, and the progress
 * record a deployment accumulates as it runs.
 *
 * KEY INTERFACES:
 * • ServiceConfiguration - Validated, immutable input to a deployment
 * • Task / TaskGroup     - Read projections of live ECS state
 * • DeploymentPlan       - Ordered steps with run/skip decisions
 * • DeploymentProgress   - Resources acquired so far by one deployment
 */

/**
 * ================================================================================
 * SERVICE CONFIGURATION
 * ================================================================================
 */

export type Protocol = 'TCP' | 'HTTP' | 'HTTPS';

export const PROTOCOLS: readonly Protocol[] = ['TCP', 'HTTP', 'HTTPS'];

export interface Port {
    protocol: Protocol;
    port: number;
}

export type LoadBalancerKind = 'network' | 'application';

export interface LoadBalancerBinding {
    name: string;                          // Load balancer name as given on the command line
    arn: string;                           // Resolved load balancer ARN
    kind: LoadBalancerKind;
}

export type RuleType = 'HOST' | 'PATH';

export interface Rule {
    type: RuleType;
    value: string;                         // e.g. api.example.com or /api/*
}

export interface EnvVar {
    key: string;
    value: string;
}

/**
 * Validated configuration for one `service create` call.
 *
 * //! IMMUTABLE: built once by ServiceConfigBuilder and frozen
 */
export interface ServiceConfiguration {
    name: string;
    cpu: string;                           // CPU units, e.g. "256"
    memory: string;                        // MiB, e.g. "512"
    image?: string;                        // Omitted means build and push from the working directory
    port?: Port;
    loadBalancer?: LoadBalancerBinding;
    rules: Rule[];                         // Non-empty only with a load balancer
    envVars: EnvVar[];                     // Keys unique, insertion order kept
}

/**
 * ================================================================================
 * TASK PROJECTIONS
 * ================================================================================
 */

/**
 * One ECS task as seen by the inventory, enriched with its task definition
 * and network attachment.
 */
export interface Task {
    taskId: string;                        // Trailing segment of the task ARN
    cpu: string;
    memory: string;
    createdAt?: Date;
    desiredStatus: string;
    lastStatus: string;
    deploymentId: string;                  // Task definition revision number
    image: string;
    taskRole: string;
    envVars: EnvVar[];
    eniId: string;                         // Empty when no network interface is attached
    subnetId: string;                      // Empty when no network interface is attached
    startedBy: string;
}

export interface TaskGroup {
    taskGroupName: string;
    instances: number;
}

export interface NetworkInterfaceDetails {
    eniId: string;
    publicIp?: string;
    securityGroupIds: string[];
}

/**
 * ================================================================================
 * DEPLOYMENT PLAN AND PROGRESS
 * ================================================================================
 */

export type DeploymentStep =
    | 'repository'
    | 'network'
    | 'executionRole'
    | 'logGroup'
    | 'image'
    | 'loadBalancer'
    | 'taskDefinition'
    | 'service';

export interface PlannedStep {
    step: DeploymentStep;
    action: 'run' | 'skip';
    detail: string;
}

export interface DeploymentPlan {
    serviceName: string;
    steps: PlannedStep[];
    routing?: 'rules' | 'default-action';  // Only when a load balancer is bound
}

/**
 * Everything a deployment has acquired or created, in step order. On failure
 * this is the inventory of what was left behind.
 */
export interface DeploymentProgress {
    completed: DeploymentStep[];
    repositoryUri?: string;
    subnetIds?: string[];
    executionRoleArn?: string;
    logGroupName?: string;
    image?: string;
    targetGroupArn?: string;
    ruleArns?: string[];
    defaultActionListenerArns?: string[];
    taskDefinitionArn?: string;
    serviceArn?: string;
}

export interface Deployment {
    plan: DeploymentPlan;
    progress: DeploymentProgress;
}
