export * from "./types.js";
export * from "./errors.js";
export { loadConfig, TASK_REQUIREMENTS, type GatekeeperConfig, type TaskRequirement } from "./config.js";
export {
  classifyTool,
  defaultPolicy,
  isConsequentialTool,
  isFileMutation,
  isReadOnlyShellCommand,
  isSafeTempPath,
  loadPolicy,
  spawnedAgentName,
  type GatekeeperPolicy,
  type ToolCategory,
  type ToolClass,
} from "./policy.js";
export { getStatePaths, type StatePaths } from "./paths.js";
export { normalizeEvent, resolveEventType, resolveWorkspaceRoot, type NormalizeOptions } from "./normalizer.js";
export { SessionStore, applyMutations, defaultSessionState, AUDIT_LIMIT, SCHEMA_VERSION } from "./stateStore.js";
export { BlockFlagManager, activeBlockOf } from "./blockFlags.js";
export {
  COMPLIANCE_TOOL_NAME,
  LocalComplianceChecker,
  McpComplianceChecker,
  complianceResultSchema,
  evaluateCompliance,
  runComplianceCheck,
  sessionSummarySchema,
  stdioTransportFactory,
  type ComplianceChecker,
  type ComplianceResult,
  type SessionSummary,
} from "./compliance.js";
export * from "./gates/index.js";
export { DEFAULT_GATE_ORDER, buildRegistry, type GateRegistry, type RegistryEntry } from "./registry.js";
export { aggregateVerdict, runGates, type RunResult, type RunnerDeps } from "./runner.js";
export { advisoryResponse, buildResponse, formatDecision, route, type RouteOptions, type RouteOutcome } from "./router.js";
