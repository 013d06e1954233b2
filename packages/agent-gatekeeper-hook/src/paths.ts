import path from "node:path";

export type StatePaths = {
  stateRoot: string;
  sessionsDir: string;
  blocksDir: string;
  auditLogPath: string;
};

export function getStatePaths(workspaceRoot: string, stateDir?: string): StatePaths {
  const stateRoot = stateDir ? path.resolve(workspaceRoot, stateDir) : path.join(workspaceRoot, ".ai", "agent-gatekeeper");
  return {
    stateRoot,
    sessionsDir: path.join(stateRoot, "sessions"),
    blocksDir: path.join(stateRoot, "blocks"),
    auditLogPath: path.join(stateRoot, "audit.log"),
  };
}

// Session ids come from hook payloads; keep them to one safe path segment.
export function sessionFileStem(sessionId: string): string {
  return sessionId.replace(/[^A-Za-z0-9._-]/g, "_").replace(/^\.+/, "_");
}

export function sessionStatePath(paths: StatePaths, sessionId: string): string {
  return path.join(paths.sessionsDir, `${sessionFileStem(sessionId)}.json`);
}

export function sessionLockPath(paths: StatePaths, sessionId: string): string {
  return path.join(paths.sessionsDir, `${sessionFileStem(sessionId)}.lock`);
}

export function sessionBlocksDir(paths: StatePaths, sessionId: string): string {
  return path.join(paths.blocksDir, sessionFileStem(sessionId));
}

export function processSessionPath(paths: StatePaths, pid: number): string {
  return path.join(paths.stateRoot, `session-${pid}.json`);
}
