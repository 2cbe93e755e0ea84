import fs from "node:fs";
import path from "node:path";
import type { EngineState } from "../types.js";
import { engineStateSchema } from "./schema.js";

export function nowIso(): string {
  return new Date().toISOString();
}

export function deepClone<T>(value: T): T {
  return structuredClone(value);
}

export function createEmptyState(): EngineState {
  return {
    flows: [],
    jobs: [],
    tasks: [],
    processedItems: [],
    engineData: {},
    scheduleMarkers: {},
    chatSessions: []
  };
}

export function ensureStateFile(dbPath: string): void {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  if (!fs.existsSync(dbPath)) {
    writeStateFile(dbPath, createEmptyState());
  }
}

export function readStateFile(dbPath: string): EngineState {
  const raw = fs.readFileSync(dbPath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`State file ${dbPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const decoded = engineStateSchema.safeParse(parsed);
  if (!decoded.success) {
    const firstIssue = decoded.error.issues[0];
    throw new Error(
      `State file ${dbPath} failed validation at ${firstIssue?.path.join(".") || "<root>"}: ${firstIssue?.message ?? "unknown issue"}`
    );
  }

  return decoded.data;
}

/** Writes through a temp file and rename so a crash never leaves a torn state file. */
export function writeStateFile(dbPath: string, state: EngineState): void {
  const tempPath = `${dbPath}.${process.pid}.tmp`;
  fs.writeFileSync(tempPath, JSON.stringify(state, null, 2), "utf8");
  fs.renameSync(tempPath, dbPath);
}
