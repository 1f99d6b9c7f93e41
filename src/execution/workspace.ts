import { promises as fs } from "fs";
import path from "path";
import { newRunId, type RunId } from "../core/ids.js";

export interface ScriptWorkspace {
  runId: RunId;
  rootDir: string;
  scriptDir: string;
  logDir: string;
  scriptPath(name: string): string;
  logPath(name: string): string;
}

function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

export { safeJoin };

export async function createScriptWorkspace(rootDir: string, runId: RunId = newRunId()): Promise<ScriptWorkspace> {
  const root = path.resolve(rootDir, runId);
  const scriptDir = path.join(root, "scripts");
  const logDir = path.join(root, "logs");

  await fs.mkdir(scriptDir, { recursive: true });
  await fs.mkdir(logDir, { recursive: true });

  return {
    runId,
    rootDir: root,
    scriptDir,
    logDir,
    scriptPath: (name: string) => safeJoin(scriptDir, name),
    logPath: (name: string) => safeJoin(logDir, name)
  };
}
