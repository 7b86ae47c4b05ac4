import type {
  V1ClusterRoleBinding,
  V1Namespace,
  V1Pod,
  V1ServiceAccount,
} from '@kubernetes/client-node';
import type { Logger } from 'winston';
import type { ResourceOperationOptions } from '../kubernetes/BaseResourceOperations.js';

/**
 * Fully resolved must-gather settings. Built once per invocation and never mutated.
 */
export interface PlanConfig {
  readonly nodeName?: string;
  readonly nodeSelector: Readonly<Record<string, string>>;
  readonly hostNetwork: boolean;
  /** Gather command, already wrapped with the timeout binary when a timeout was given */
  readonly gatherCommand: string;
  /** Gather images in the order given; empty means the default image */
  readonly images: readonly string[];
  readonly sourceDir: string;
  readonly timeout?: string;
  readonly since?: string;
  readonly namespace: string;
  readonly keepNamespace: boolean;
  /** Accepted and recorded; image discovery is not implemented */
  readonly allComponentImages: boolean;
}

/**
 * Resource descriptors for one must-gather run plus the names the rendered instructions refer to
 */
export interface ResourcePlan {
  /** Absent when the target namespace already exists */
  namespace?: V1Namespace;
  serviceAccount: V1ServiceAccount;
  clusterRoleBinding: V1ClusterRoleBinding;
  pod: V1Pod;
  names: PlanNames;
}

export interface PlanNames {
  namespace: string;
  serviceAccount: string;
  clusterRoleBinding: string;
  gatherContainers: string[];
}

/**
 * Per-invocation state handed down from the tool host
 */
export interface InvocationContext {
  /** Aborts when the caller cancels or the host deadline passes */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface NamespaceLike {
  metadata?: {
    name?: string;
  };
}

/**
 * Read-only namespace listing the collision check depends on
 */
export interface NamespaceLister {
  list(options?: ResourceOperationOptions): Promise<{ items: NamespaceLike[] }>;
}

/** Turns one resource descriptor into a YAML document */
export type YamlSerializer = (resource: object) => string;

/** Source of uniformly distributed integers in [0, max) */
export type RandomIntSource = (max: number) => number;
