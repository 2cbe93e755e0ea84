import { mkdir, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { nanoid } from "nanoid";
import { dataPacketListSchema, measurePackets } from "../engine/dataPacket.js";
import { PacketAccessError } from "../errors.js";
import type { DataPacket, DataRef } from "../types.js";

export interface PacketScope {
  flowId: string;
  jobId: string;
  flowStepId: string;
}

function safeSegment(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9_-]/g, "_");
  return cleaned.length > 0 ? cleaned : "_";
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Stores packet sets between steps. Small sets travel inline inside the task;
 * larger ones are written under a directory owned by the flow, and a read is
 * refused when the reference points outside the reading flow's directory.
 */
export class PacketRepository {
  constructor(
    private readonly rootPath: string,
    private readonly inlineLimitBytes: number
  ) {}

  flowDirectory(flowId: string): string {
    return path.join(this.rootPath, `flow-${safeSegment(flowId)}`);
  }

  jobDirectory(flowId: string, jobId: string): string {
    return path.join(this.flowDirectory(flowId), `job-${safeSegment(jobId)}`);
  }

  async store(packets: DataPacket[], scope: PacketScope): Promise<DataRef> {
    if (measurePackets(packets) <= this.inlineLimitBytes) {
      return { kind: "inline", packets };
    }

    const directory = this.jobDirectory(scope.flowId, scope.jobId);
    await mkdir(directory, { recursive: true });
    const fileName = `${safeSegment(scope.flowStepId)}-${nanoid(10)}.json`;
    await writeFile(path.join(directory, fileName), JSON.stringify(packets), "utf8");

    return {
      kind: "file",
      flowId: scope.flowId,
      path: path.relative(this.rootPath, path.join(directory, fileName)),
      storedAt: new Date().toISOString()
    };
  }

  async retrieve(ref: DataRef, flowId: string): Promise<DataPacket[]> {
    if (ref.kind === "inline") {
      return ref.packets;
    }

    const flowDirectory = this.flowDirectory(flowId);
    const absolutePath = path.resolve(this.rootPath, ref.path);
    if (ref.flowId !== flowId || !absolutePath.startsWith(`${flowDirectory}${path.sep}`)) {
      throw new PacketAccessError(`Packet reference ${ref.path} does not belong to flow ${flowId}.`);
    }

    let raw: string;
    try {
      raw = await readFile(absolutePath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new PacketAccessError(`Packet file ${ref.path} no longer exists.`);
      }
      throw error;
    }

    const decoded = dataPacketListSchema.safeParse(JSON.parse(raw));
    if (!decoded.success) {
      throw new PacketAccessError(`Packet file ${ref.path} is malformed: ${decoded.error.issues[0]?.message ?? "invalid"}`);
    }
    return decoded.data;
  }

  async deleteJobPackets(flowId: string, jobId: string): Promise<void> {
    await rm(this.jobDirectory(flowId, jobId), { recursive: true, force: true });
  }

  /** Deletes job packet directories last written before the cutoff. */
  async purgeOlderThan(before: Date): Promise<number> {
    let flowEntries: string[];
    try {
      flowEntries = await readdir(this.rootPath);
    } catch (error) {
      if (isMissingFileError(error)) {
        return 0;
      }
      throw error;
    }

    let removed = 0;
    for (const flowEntry of flowEntries.filter((entry) => entry.startsWith("flow-"))) {
      const flowDirectory = path.join(this.rootPath, flowEntry);
      const jobEntries = await readdir(flowDirectory);
      for (const jobEntry of jobEntries.filter((entry) => entry.startsWith("job-"))) {
        const jobDirectory = path.join(flowDirectory, jobEntry);
        const details = await stat(jobDirectory);
        if (details.mtime.getTime() < before.getTime()) {
          await rm(jobDirectory, { recursive: true, force: true });
          removed += 1;
        }
      }
    }
    return removed;
  }
}
