export * from './constants.js';
export type {
  PlanConfig,
  ResourcePlan,
  PlanNames,
  InvocationContext,
  NamespaceLike,
  NamespaceLister,
  YamlSerializer,
  RandomIntSource,
} from './types.js';
export { NamespaceListError, PlanRenderError } from './errors.js';
export { parseDuration, isValidDuration, formatSeconds } from './DurationParser.js';
export {
  planMustGatherArgsSchema,
  resolvePlanConfig,
  generateNameSuffix,
  parseNodeSelector,
  normalizeSourceDir,
  isValidNamespaceName,
} from './ParameterResolver.js';
export type { PlanMustGatherArgs, ResolveOptions } from './ParameterResolver.js';
export {
  buildResourcePlan,
  buildGatherContainers,
  clusterRoleBindingName,
  gatherContainerName,
  withoutNamespace,
} from './PlanBuilder.js';
export { namespaceExists } from './NamespaceCollisionChecker.js';
export { renderPlan, defaultYamlSerializer, PLAN_FILE_NAME, LOCAL_OUTPUT_DIR } from './PlanRenderer.js';
export type { RenderOptions } from './PlanRenderer.js';
