import type { GateName } from "../types.js";
import { CommandInterceptGate } from "./commandIntercept.js";
import { CustodietGate } from "./custodiet.js";
import type { Gate } from "./gate.js";
import { HandoverGate } from "./handover.js";
import { HydrationGate } from "./hydration.js";
import { TaskGate } from "./task.js";

export * from "./gate.js";
export { CommandInterceptGate, exclusionGlob, rewriteSearchCommand, targetsExcludedDir } from "./commandIntercept.js";
export { CustodietGate } from "./custodiet.js";
export { HandoverGate } from "./handover.js";
export { HydrationGate, shouldSkipHydration } from "./hydration.js";
export { TaskGate, baseToolName, taskIdFromResult } from "./task.js";

export function createGates(): Record<GateName, Gate> {
  return {
    hydration: new HydrationGate(),
    task: new TaskGate(),
    custodiet: new CustodietGate(),
    command_intercept: new CommandInterceptGate(),
    handover: new HandoverGate(),
  };
}
