/**
 * ================================================================================
 * SERVICES MODULE - Core Service Layer Exports
 * ================================================================================
 *
 * Central export point for the AWS service wrappers.
 *
 * USAGE:
 * import { EcsService, NetworkService } from '../services';
 */

// Settings and credential preflight
export * from './config';

// Compute platform
export * from './ecs';
export * from './iam';
export * from './logs';

// Images, networking and routing
export * from './ecr';
export * from './network';
export * from './loadBalancer';
