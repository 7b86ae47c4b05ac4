import { dump } from 'js-yaml';
import type { KubernetesObject } from '@kubernetes/client-node';
import { OUTPUT_MOUNT_PATH, WAIT_CONTAINER_NAME } from './constants.js';
import { PlanRenderError } from './errors.js';
import type { ResourcePlan, YamlSerializer } from './types.js';

export const PLAN_FILE_NAME = 'must-gather-plan.yaml';
export const LOCAL_OUTPUT_DIR = './must-gather-output';

export interface RenderOptions {
  keepNamespace: boolean;
  sourceDir: string;
  serializer?: YamlSerializer;
}

export const defaultYamlSerializer: YamlSerializer = (resource) =>
  dump(resource, { noRefs: true, lineWidth: -1 });

function renderHeader(plan: ResourcePlan, options: RenderOptions): string[] {
  const { namespace, clusterRoleBinding, gatherContainers } = plan.names;
  const lines = [
    `# Save the following content to a file (e.g., ${PLAN_FILE_NAME}) and create the resources with 'kubectl create -f ${PLAN_FILE_NAME}'`,
    '# Find the name generated for the must-gather pod with:',
    `# kubectl get pods -n ${namespace}`,
    "# Monitor the pod's logs to see when the must-gather process is complete:",
    ...gatherContainers.map(
      (container) => `# kubectl logs -f -n ${namespace} <pod-name> -c ${container}`,
    ),
    `# The gather containers write their output to ${options.sourceDir}`,
    '# Once the logs indicate completion, copy the results with:',
    `# kubectl cp -n ${namespace} <pod-name>:${OUTPUT_MOUNT_PATH} ${LOCAL_OUTPUT_DIR} -c ${WAIT_CONTAINER_NAME}`,
  ];

  if (!options.keepNamespace) {
    lines.push(
      '# Finally, clean up the resources with:',
      `# kubectl delete ns ${namespace}`,
      `# kubectl delete clusterrolebinding ${clusterRoleBinding}`,
    );
  }

  return lines;
}

function serialize(resource: KubernetesObject, serializer: YamlSerializer): string {
  const kind = resource.kind ?? 'resource';
  let document: string;
  try {
    document = serializer(resource);
  } catch (error) {
    throw new PlanRenderError(kind, error instanceof Error ? error.message : String(error));
  }
  if (document.length === 0) {
    throw new PlanRenderError(kind, 'serializer produced no output');
  }
  return document.endsWith('\n') ? document : `${document}\n`;
}

/**
 * Render the plan as operator instructions followed by a fenced multi-document manifest.
 *
 * Documents appear as Namespace (when present), ServiceAccount, ClusterRoleBinding, Pod.
 *
 * @throws {PlanRenderError} if any descriptor fails to serialize; nothing is returned then
 */
export function renderPlan(plan: ResourcePlan, options: RenderOptions): string {
  const serializer = options.serializer ?? defaultYamlSerializer;
  const resources: KubernetesObject[] = [
    ...(plan.namespace ? [plan.namespace] : []),
    plan.serviceAccount,
    plan.clusterRoleBinding,
    plan.pod,
  ];

  // Serialize everything before assembling so a failure never leaves partial output
  const documents = resources.map((resource) => `---\n${serialize(resource, serializer)}`);

  return [...renderHeader(plan, options), '', '```yaml', documents.join('') + '```'].join('\n');
}
