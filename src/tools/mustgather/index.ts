export type { BaseTool, ClientConnector, MustGatherClient } from './BaseTool.js';
export { PlanMustGatherTool } from './PlanMustGatherTool.js';
export type { PlanMustGatherToolOptions } from './PlanMustGatherTool.js';
