import { z } from "zod";
import { dataPacketSchema } from "../engine/dataPacket.js";
import { flowScheduleSchema, stepConfigSchema } from "../engine/stepConfig.js";
import type { ChatSession, DataRef, EngineState, Flow, Job, Message, ProcessedItem, QueueTask } from "../types.js";

const flowSchema: z.ZodType<Flow, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  pipelineId: z.string().min(1),
  name: z.string(),
  steps: z.array(
    z.object({
      flowStepId: z.string().min(1),
      executionOrder: z.number().int().min(0),
      config: stepConfigSchema
    })
  ),
  schedule: flowScheduleSchema,
  createdAt: z.string(),
  updatedAt: z.string()
});

const jobSchema: z.ZodType<Job, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  flowId: z.string().min(1),
  pipelineId: z.string().min(1),
  flowStepIds: z.array(z.string().min(1)),
  status: z.enum(["pending", "running", "completed", "completed_no_items", "failed"]),
  currentStepIndex: z.number().int().min(0),
  context: z.string().default(""),
  source: z.enum(["manual", "schedule", "api"]).default("manual"),
  failure: z
    .object({
      reason: z.enum([
        "exception",
        "non_array_payload_returned",
        "step_type_not_found_in_registry",
        "flow_step_not_found",
        "data_packet_unavailable",
        "task_delivery_exhausted",
        "orphaned_job",
        "cancelled"
      ]),
      message: z.string(),
      context: z.record(z.unknown()).default({})
    })
    .nullable()
    .default(null),
  logs: z.array(z.string()).default([]),
  createdAt: z.string(),
  updatedAt: z.string(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional()
});

export const dataRefSchema: z.ZodType<DataRef, z.ZodTypeDef, unknown> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("inline"), packets: z.array(dataPacketSchema) }),
  z.object({ kind: z.literal("file"), flowId: z.string().min(1), path: z.string().min(1), storedAt: z.string() })
]);

const taskSchema: z.ZodType<QueueTask, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  jobId: z.string().min(1),
  flowStepId: z.string().min(1),
  dataRef: dataRefSchema,
  status: z.enum(["queued", "leased", "done", "dead"]),
  attempts: z.number().int().min(0),
  availableAt: z.string(),
  leaseExpiresAt: z.string().optional(),
  lastError: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string()
});

const processedItemSchema: z.ZodType<ProcessedItem, z.ZodTypeDef, unknown> = z.object({
  flowStepId: z.string().min(1),
  sourceType: z.string().min(1),
  itemIdentifier: z.string().min(1),
  jobId: z.string(),
  createdAt: z.string()
});

export const messageSchema: z.ZodType<Message, z.ZodTypeDef, unknown> = z.object({
  role: z.enum(["user", "assistant", "system"]),
  parts: z.array(
    z.discriminatedUnion("type", [
      z.object({ type: z.literal("text"), text: z.string() }),
      z.object({
        type: z.literal("function_call"),
        call: z.object({ id: z.string(), name: z.string(), args: z.record(z.unknown()) })
      }),
      z.object({
        type: z.literal("function_response"),
        response: z.object({ callId: z.string(), name: z.string(), result: z.record(z.unknown()) })
      })
    ])
  )
});

const chatSessionSchema: z.ZodType<ChatSession, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  messages: z.array(messageSchema),
  createdAt: z.string(),
  updatedAt: z.string()
});

export const engineStateSchema: z.ZodType<EngineState, z.ZodTypeDef, unknown> = z.object({
  flows: z.array(flowSchema).default([]),
  jobs: z.array(jobSchema).default([]),
  tasks: z.array(taskSchema).default([]),
  processedItems: z.array(processedItemSchema).default([]),
  engineData: z.record(z.record(z.string())).default({}),
  scheduleMarkers: z.record(z.string()).default({}),
  chatSessions: z.array(chatSessionSchema).default([])
});
