import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createDataPacket } from "../../server/engine/dataPacket.js";
import { PacketAccessError } from "../../server/errors.js";
import { PacketRepository } from "../../server/packets/packetRepository.js";

const scope = { flowId: "flow-a", jobId: "job-1", flowStepId: "step-2" };

describe("packet repository", () => {
  let rootPath: string;

  beforeEach(async () => {
    rootPath = await mkdtemp(path.join(tmpdir(), "flowline-packets-"));
  });

  afterEach(async () => {
    await rm(rootPath, { recursive: true, force: true });
  });

  const packets = [
    createDataPacket({
      title: "Launch notes",
      body: "Version 2 is out.",
      metadata: { source_type: "rss", item_identifier: "guid-7" },
      attachments: [{ path: "/tmp/cover.png", mimeType: "image/png", name: "cover.png" }]
    })
  ];

  it("keeps small packet sets inline", async () => {
    const repository = new PacketRepository(rootPath, 16_384);

    const ref = await repository.store(packets, scope);

    expect(ref).toEqual({ kind: "inline", packets });
    expect(await repository.retrieve(ref, "flow-a")).toEqual(packets);
  });

  it("writes large packet sets under the flow directory and reads them back", async () => {
    const repository = new PacketRepository(rootPath, 0);

    const ref = await repository.store(packets, scope);

    expect(ref.kind).toBe("file");
    if (ref.kind !== "file") {
      return;
    }
    expect(ref.flowId).toBe("flow-a");
    expect(ref.path.startsWith(path.join("flow-flow-a", "job-job-1", "step-2-"))).toBe(true);

    const restored = await repository.retrieve(ref, "flow-a");
    expect(restored[0]?.content).toEqual({ title: "Launch notes", body: "Version 2 is out." });
    expect(restored[0]?.metadata.item_identifier).toBe("guid-7");
    expect(restored[0]?.attachments).toEqual([{ path: "/tmp/cover.png", mimeType: "image/png", name: "cover.png" }]);
  });

  it("refuses to read another flow's packets", async () => {
    const repository = new PacketRepository(rootPath, 0);
    const ref = await repository.store(packets, scope);

    await expect(repository.retrieve(ref, "flow-b")).rejects.toBeInstanceOf(PacketAccessError);
  });

  it("refuses references that escape the flow directory", async () => {
    const repository = new PacketRepository(rootPath, 0);

    await expect(
      repository.retrieve({ kind: "file", flowId: "flow-a", path: "../outside.json", storedAt: "2026-01-01T00:00:00.000Z" }, "flow-a")
    ).rejects.toThrow("does not belong to flow flow-a");
  });

  it("reports packet files removed with the job", async () => {
    const repository = new PacketRepository(rootPath, 0);
    const ref = await repository.store(packets, scope);

    await repository.deleteJobPackets("flow-a", "job-1");

    await expect(repository.retrieve(ref, "flow-a")).rejects.toThrow("no longer exists");
  });

  it("purges job directories last written before the cutoff", async () => {
    const repository = new PacketRepository(rootPath, 0);
    await repository.store(packets, scope);

    expect(await repository.purgeOlderThan(new Date(Date.now() - 60_000))).toBe(0);
    expect(await repository.purgeOlderThan(new Date(Date.now() + 60_000))).toBe(1);
  });

  it("purges nothing when no packet has been written yet", async () => {
    const repository = new PacketRepository(path.join(rootPath, "missing"), 0);

    expect(await repository.purgeOlderThan(new Date())).toBe(0);
  });
});
