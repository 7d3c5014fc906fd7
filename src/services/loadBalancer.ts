/**
 * ================================================================================
 * LOAD BALANCER SERVICE - ELBv2 Routing
 * ================================================================================
 *
 * Resolves existing load balancers and wires new target groups into their
 * listeners, either through routing rules or by taking over the default action.
 *
 * //! Rules and default actions are attached to EVERY listener of the balancer
 */

import {
    ElasticLoadBalancingV2Client,
    DescribeLoadBalancersCommand,
    DescribeListenersCommand,
    DescribeRulesCommand,
    CreateTargetGroupCommand,
    CreateRuleCommand,
    ModifyListenerCommand,
    LoadBalancerTypeEnum
} from '@aws-sdk/client-elastic-load-balancing-v2';
import { LoadBalancerKind, Protocol, Rule, RuleType } from '../types';
import { logger } from '../utils/logger';
import { remoteCall } from '../utils/errors';

export const RULE_PRIORITY_STEP = 10;

export interface LoadBalancerDescription {
    name: string;
    arn: string;
    kind: LoadBalancerKind;
    vpcId: string;
}

/**
 * Options for the listener-wide routing changes. onApplied is called with each
 * ARN as soon as its change is made, so callers can track partial progress.
 */
export interface RoutingOptions {
    signal?: AbortSignal;
    onApplied?: (arn: string) => void;
}

export interface CreateTargetGroupInput {
    name: string;
    port: number;
    protocol: Protocol;
    vpcId: string;
}

const CONDITION_FIELDS: Record<RuleType, string> = {
    HOST: 'host-header',
    PATH: 'path-pattern'
};

function toKind(type: LoadBalancerTypeEnum | undefined): LoadBalancerKind | undefined {
    return type === 'network' || type === 'application' ? type : undefined;
}

/**
 * Next free priority on a listener: the highest numeric priority plus 10.
 * The "default" rule carries no number and is ignored.
 */
export function nextRulePriority(priorities: Array<string | undefined>): number {
    const numeric = priorities
        .filter((priority): priority is string => priority !== undefined && /^\d+$/.test(priority))
        .map(Number);

    return Math.max(0, ...numeric) + RULE_PRIORITY_STEP;
}

export class LoadBalancerService {
    constructor(private readonly elbv2: ElasticLoadBalancingV2Client) {}

    async describe(name: string): Promise<LoadBalancerDescription> {
        return remoteCall('Could not describe load balancer', async () => {
            const result = await this.elbv2.send(new DescribeLoadBalancersCommand({ Names: [name] }));
            const loadBalancer = result.LoadBalancers?.[0];

            if (!loadBalancer?.LoadBalancerArn) {
                throw new Error(`Load balancer ${name} not found`);
            }

            const kind = toKind(loadBalancer.Type);
            if (!kind) {
                throw new Error(`Load balancer ${name} has unsupported type ${loadBalancer.Type ?? 'unknown'}`);
            }

            return {
                name,
                arn: loadBalancer.LoadBalancerArn,
                kind,
                vpcId: loadBalancer.VpcId ?? ''
            };
        });
    }

    /**
     * @returns the ARN of the new target group (target type ip)
     */
    async createTargetGroup(input: CreateTargetGroupInput): Promise<string> {
        return remoteCall('Could not create target group', async () => {
            const result = await this.elbv2.send(new CreateTargetGroupCommand({
                Name: input.name,
                Port: input.port,
                Protocol: input.protocol,
                VpcId: input.vpcId,
                TargetType: 'ip'
            }));

            const arn = result.TargetGroups?.[0]?.TargetGroupArn;
            if (!arn) {
                throw new Error(`CreateTargetGroup returned no ARN for ${input.name}`);
            }

            logger.debug('Target group created', { name: input.name, arn });
            return arn;
        });
    }

    async listenerArns(loadBalancerArn: string): Promise<string[]> {
        return remoteCall('Could not describe listeners', async () => {
            const result = await this.elbv2.send(new DescribeListenersCommand({ LoadBalancerArn: loadBalancerArn }));
            return (result.Listeners ?? []).flatMap((listener) => listener.ListenerArn ? [listener.ListenerArn] : []);
        });
    }

    /**
     * Add one forwarding rule to every listener of the load balancer.
     *
     * @returns the ARNs of the created rules
     */
    async addRule(loadBalancerArn: string, targetGroupArn: string, rule: Rule, options: RoutingOptions = {}): Promise<string[]> {
        const listeners = await this.listenerArns(loadBalancerArn);
        const ruleArns: string[] = [];

        for (const listenerArn of listeners) {
            options.signal?.throwIfAborted();

            const ruleArn = await remoteCall('Could not create listener rule', async () => {
                const existing = await this.elbv2.send(new DescribeRulesCommand({ ListenerArn: listenerArn }));
                const priority = nextRulePriority((existing.Rules ?? []).map((r) => r.Priority));

                const created = await this.elbv2.send(new CreateRuleCommand({
                    ListenerArn: listenerArn,
                    Priority: priority,
                    Conditions: [{ Field: CONDITION_FIELDS[rule.type], Values: [rule.value] }],
                    Actions: [{ Type: 'forward', TargetGroupArn: targetGroupArn }]
                }));

                logger.debug('Listener rule created', { listenerArn, priority, rule });
                return created.Rules?.[0]?.RuleArn ?? '';
            });

            ruleArns.push(ruleArn);
            options.onApplied?.(ruleArn);
        }

        return ruleArns;
    }

    /**
     * Point every listener's default action at the target group.
     *
     * @returns the ARNs of the modified listeners
     */
    async setDefaultAction(loadBalancerArn: string, targetGroupArn: string, options: RoutingOptions = {}): Promise<string[]> {
        const listeners = await this.listenerArns(loadBalancerArn);

        for (const listenerArn of listeners) {
            options.signal?.throwIfAborted();

            await remoteCall('Could not update listener default action', () =>
                this.elbv2.send(new ModifyListenerCommand({
                    ListenerArn: listenerArn,
                    DefaultActions: [{ Type: 'forward', TargetGroupArn: targetGroupArn }]
                }))
            );
            options.onApplied?.(listenerArn);
        }

        return listeners;
    }
}
