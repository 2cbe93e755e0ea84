import path from "node:path";

const DEFAULT_DATA_DIR = "data";
const STATE_FILE_NAME = "engine-db.json";
const PACKETS_DIR_NAME = "packets";

function normalizeDataDir(raw: string | undefined): string {
  const trimmed = raw?.trim() ?? "";
  if (trimmed.length === 0) {
    return DEFAULT_DATA_DIR;
  }
  return trimmed;
}

export function resolveDataRootPath(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  const configured = normalizeDataDir(env.FLOWLINE_DATA_DIR);
  return path.resolve(cwd, configured);
}

export function resolveStateFilePath(dataDir: string): string {
  return path.join(dataDir, STATE_FILE_NAME);
}

export function resolvePacketsRootPath(dataDir: string): string {
  return path.join(dataDir, PACKETS_DIR_NAME);
}
