import { z } from "zod";
import type { DataPacket, PacketAttachment, StepType } from "../types.js";

export const dataPacketSchema: z.ZodType<DataPacket, z.ZodTypeDef, unknown> = z.object({
  content: z.object({
    title: z.string().default(""),
    body: z.string().default("")
  }),
  metadata: z.record(z.unknown()).default({}),
  attachments: z
    .array(
      z.object({
        path: z.string().min(1),
        mimeType: z.string().default("application/octet-stream"),
        name: z.string().optional()
      })
    )
    .default([]),
  processing: z.record(z.unknown()).default({})
});

export const dataPacketListSchema = z.array(dataPacketSchema);

export interface DataPacketInput {
  title?: string;
  body?: string;
  metadata?: Record<string, unknown>;
  attachments?: PacketAttachment[];
  processing?: Record<string, unknown>;
}

export function createDataPacket(input: DataPacketInput): DataPacket {
  return {
    content: {
      title: input.title ?? "",
      body: input.body ?? ""
    },
    metadata: {
      date_created: new Date().toISOString(),
      ...(input.metadata ?? {})
    },
    attachments: input.attachments ? [...input.attachments] : [],
    processing: input.processing ? { ...input.processing } : {}
  };
}

/** Packet sets are kept newest first. */
export function addDataPacket(data: DataPacket[], packet: DataPacket): DataPacket[] {
  return [packet, ...data];
}

export function stampPacket(packet: DataPacket, flowStepId: string, stepType: StepType): DataPacket {
  return {
    ...packet,
    metadata: {
      ...packet.metadata,
      flow_step_id: flowStepId,
      step_type: stepType
    }
  };
}

export function readMetadataString(packet: DataPacket | undefined, key: string): string | undefined {
  const value = packet?.metadata[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export const HANDLER_COMPLETION_TYPE = "ai_handler_complete";

export function createHandlerCompletionPacket(input: {
  handler: string;
  toolName: string;
  flowStepId: string;
  result: Record<string, unknown>;
}): DataPacket {
  return createDataPacket({
    title: `Handler ${input.handler} completed`,
    body: JSON.stringify(input.result),
    metadata: {
      type: HANDLER_COMPLETION_TYPE,
      handler: input.handler,
      tool_name: input.toolName,
      flow_step_id: input.flowStepId,
      step_type: "ai",
      handler_result: input.result
    }
  });
}

/** Only a completion written by `fromFlowStepId` counts. */
export function findHandlerCompletion(
  data: DataPacket[],
  handler: string,
  fromFlowStepId: string | undefined
): DataPacket | undefined {
  if (!fromFlowStepId) {
    return undefined;
  }
  return data.find(
    (packet) =>
      readMetadataString(packet, "type") === HANDLER_COMPLETION_TYPE &&
      readMetadataString(packet, "handler") === handler &&
      readMetadataString(packet, "flow_step_id") === fromFlowStepId
  );
}

/** Serialized size used to decide between inline and file storage. */
export function measurePackets(packets: DataPacket[]): number {
  return Buffer.byteLength(JSON.stringify(packets), "utf8");
}
