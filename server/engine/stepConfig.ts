import { z } from "zod";
import { StepConfigError } from "../errors.js";
import type { FlowSchedule, ScheduleInterval, StepConfig } from "../types.js";

const handlerSlugSchema = z.string().trim().min(1).max(120);
const handlerConfigSchema = z.record(z.unknown()).default({});

const fetchStepSchema = z.object({
  stepType: z.literal("fetch"),
  handler: handlerSlugSchema,
  handlerConfig: handlerConfigSchema
});

const aiStepSchema = z.object({
  stepType: z.literal("ai"),
  systemPrompt: z.string().default(""),
  userMessage: z.string().optional(),
  provider: z.enum(["openai", "claude"]).optional(),
  model: z.string().trim().min(1).optional(),
  enabledTools: z.array(z.string().trim().min(1)).max(64).default([]),
  maxTurns: z.number().int().optional()
});

const publishStepSchema = z.object({
  stepType: z.literal("publish"),
  handler: handlerSlugSchema,
  handlerConfig: handlerConfigSchema
});

const updateStepSchema = z.object({
  stepType: z.literal("update"),
  handler: handlerSlugSchema,
  handlerConfig: handlerConfigSchema
});

export const stepConfigSchema: z.ZodType<StepConfig, z.ZodTypeDef, unknown> = z.discriminatedUnion("stepType", [
  fetchStepSchema,
  aiStepSchema,
  publishStepSchema,
  updateStepSchema
]);

export const scheduleIntervalSeconds: Record<ScheduleInterval, number> = {
  every_5_minutes: 300,
  hourly: 3_600,
  every_2_hours: 7_200,
  every_4_hours: 14_400,
  qtrdaily: 21_600,
  twicedaily: 43_200,
  daily: 86_400,
  weekly: 604_800
};

export const flowScheduleSchema: z.ZodType<FlowSchedule, z.ZodTypeDef, unknown> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("manual") }),
  z.object({ kind: z.literal("once"), runAt: z.string().datetime({ offset: true }) }),
  z.object({
    kind: z.literal("interval"),
    interval: z.enum([
      "every_5_minutes",
      "hourly",
      "every_2_hours",
      "every_4_hours",
      "qtrdaily",
      "twicedaily",
      "daily",
      "weekly"
    ])
  })
]);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "config";
    return `${location}: ${issue.message}`;
  });
}

export function decodeStepConfig(raw: unknown): StepConfig {
  const parsed = stepConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StepConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export function decodeFlowSchedule(raw: unknown): FlowSchedule {
  const parsed = flowScheduleSchema.safeParse(raw ?? { kind: "manual" });
  if (!parsed.success) {
    throw new StepConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}
