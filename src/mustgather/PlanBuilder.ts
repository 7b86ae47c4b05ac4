import type {
  V1ClusterRoleBinding,
  V1Container,
  V1EnvVar,
  V1Namespace,
  V1Pod,
  V1PodSpec,
  V1ServiceAccount,
} from '@kubernetes/client-node';
import {
  CLUSTER_ADMIN_ROLE,
  CLUSTER_ROLE_BINDING_PREFIX,
  DEFAULT_MUST_GATHER_IMAGE,
  GATHER_CONTAINER_NAME,
  OUTPUT_MOUNT_PATH,
  OUTPUT_VOLUME_NAME,
  POD_GENERATE_NAME,
  POD_PRIORITY_CLASS,
  RBAC_API_GROUP,
  SERVICE_ACCOUNT_NAME,
  SINCE_ENV_VAR,
  WAIT_CONTAINER_COMMAND,
  WAIT_CONTAINER_IMAGE,
  WAIT_CONTAINER_NAME,
} from './constants.js';
import type { PlanConfig, ResourcePlan } from './types.js';

/**
 * Name of the binding that grants cluster-admin to the collector in `namespace`
 */
export function clusterRoleBindingName(namespace: string): string {
  return `${CLUSTER_ROLE_BINDING_PREFIX}${namespace}`;
}

/**
 * `gather` for the first container, `gather-2`, `gather-3`, ... after it
 */
export function gatherContainerName(index: number): string {
  return index === 0 ? GATHER_CONTAINER_NAME : `${GATHER_CONTAINER_NAME}-${index + 1}`;
}

function buildEnv(config: PlanConfig): V1EnvVar[] {
  const env: V1EnvVar[] = [];
  if (config.since !== undefined) {
    env.push({ name: SINCE_ENV_VAR, value: config.since });
  }
  return env;
}

function buildGatherTemplate(config: PlanConfig): V1Container {
  const env = buildEnv(config);
  return {
    name: GATHER_CONTAINER_NAME,
    image: DEFAULT_MUST_GATHER_IMAGE,
    imagePullPolicy: 'IfNotPresent',
    command: ['/bin/bash', '-c', config.gatherCommand],
    ...(env.length > 0 ? { env } : {}),
    volumeMounts: [{ name: OUTPUT_VOLUME_NAME, mountPath: config.sourceDir }],
  };
}

/**
 * One container per configured image, or a single default-image container
 */
export function buildGatherContainers(config: PlanConfig): V1Container[] {
  const template = buildGatherTemplate(config);
  if (config.images.length === 0) {
    return [template];
  }

  return config.images.map((image, index) => {
    const container = structuredClone(template);
    container.name = gatherContainerName(index);
    container.image = image;
    return container;
  });
}

function buildWaitContainer(): V1Container {
  return {
    name: WAIT_CONTAINER_NAME,
    image: WAIT_CONTAINER_IMAGE,
    imagePullPolicy: 'IfNotPresent',
    command: [...WAIT_CONTAINER_COMMAND],
    volumeMounts: [{ name: OUTPUT_VOLUME_NAME, mountPath: OUTPUT_MOUNT_PATH }],
  };
}

function buildPod(config: PlanConfig, containers: V1Container[]): V1Pod {
  const spec: V1PodSpec = {
    serviceAccountName: SERVICE_ACCOUNT_NAME,
    ...(config.nodeName ? { nodeName: config.nodeName } : {}),
    ...(Object.keys(config.nodeSelector).length > 0
      ? { nodeSelector: { ...config.nodeSelector } }
      : {}),
    ...(config.hostNetwork ? { hostNetwork: true } : {}),
    priorityClassName: POD_PRIORITY_CLASS,
    restartPolicy: 'Never',
    tolerations: [{ operator: 'Exists' }],
    volumes: [{ name: OUTPUT_VOLUME_NAME, emptyDir: {} }],
    containers,
  };

  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: {
      generateName: POD_GENERATE_NAME,
      namespace: config.namespace,
    },
    spec,
  };
}

/**
 * Build every resource a must-gather run needs. Pure: the same config gives an equal plan.
 */
export function buildResourcePlan(config: PlanConfig): ResourcePlan {
  const namespace = config.namespace;
  const bindingName = clusterRoleBindingName(namespace);
  const gatherContainers = buildGatherContainers(config);

  const namespaceResource: V1Namespace = {
    apiVersion: 'v1',
    kind: 'Namespace',
    metadata: { name: namespace },
  };

  const serviceAccount: V1ServiceAccount = {
    apiVersion: 'v1',
    kind: 'ServiceAccount',
    metadata: { name: SERVICE_ACCOUNT_NAME, namespace },
  };

  const clusterRoleBinding: V1ClusterRoleBinding = {
    apiVersion: `${RBAC_API_GROUP}/v1`,
    kind: 'ClusterRoleBinding',
    metadata: { name: bindingName },
    roleRef: {
      apiGroup: RBAC_API_GROUP,
      kind: 'ClusterRole',
      name: CLUSTER_ADMIN_ROLE,
    },
    subjects: [{ kind: 'ServiceAccount', name: SERVICE_ACCOUNT_NAME, namespace }],
  };

  return {
    namespace: namespaceResource,
    serviceAccount,
    clusterRoleBinding,
    pod: buildPod(config, [...gatherContainers, buildWaitContainer()]),
    names: {
      namespace,
      serviceAccount: SERVICE_ACCOUNT_NAME,
      clusterRoleBinding: bindingName,
      gatherContainers: gatherContainers.map((container) => container.name),
    },
  };
}

/**
 * Drop the Namespace descriptor when the namespace is already present in the cluster.
 * All other descriptors keep referring to it.
 */
export function withoutNamespace(plan: ResourcePlan): ResourcePlan {
  const { namespace: _existing, ...rest } = plan;
  return rest;
}
