import type { JobStatus } from "./types.js";

export class FlowNotFoundError extends Error {
  readonly flowId: string;

  constructor(flowId: string, detail = "flow does not exist") {
    super(`Flow ${flowId} cannot be run: ${detail}.`);
    this.name = "FlowNotFoundError";
    this.flowId = flowId;
  }
}

export class StepConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid step configuration: ${issues.join("; ") || "unknown issue"}`);
    this.name = "StepConfigError";
    this.issues = issues;
  }
}

export class StepTypeNotFoundError extends Error {
  readonly stepType: string;

  constructor(stepType: string) {
    super(`No step implementation registered for step type "${stepType}".`);
    this.name = "StepTypeNotFoundError";
    this.stepType = stepType;
  }
}

export class HandlerNotFoundError extends Error {
  readonly handler: string;

  constructor(handler: string, stepType: string) {
    super(`Handler "${handler}" is not registered for ${stepType} steps.`);
    this.name = "HandlerNotFoundError";
    this.handler = handler;
  }
}

export class HandlerExecutionError extends Error {
  readonly handler: string;
  readonly result: Record<string, unknown>;

  constructor(handler: string, message: string, result: Record<string, unknown> = {}) {
    super(`Handler "${handler}" failed: ${message}`);
    this.name = "HandlerExecutionError";
    this.handler = handler;
    this.result = result;
  }
}

export class ToolNotFoundError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool "${toolName}" is not available in this conversation.`);
    this.name = "ToolNotFoundError";
    this.toolName = toolName;
  }
}

export class ToolClassMissingError extends Error {
  readonly toolName: string;
  readonly binding: string;

  constructor(toolName: string, binding: string) {
    super(`Tool "${toolName}" is bound to "${binding}", which has no registered implementation.`);
    this.name = "ToolClassMissingError";
    this.toolName = toolName;
    this.binding = binding;
  }
}

export class JobTransitionError extends Error {
  readonly jobId: string;

  constructor(jobId: string, from: JobStatus, to: JobStatus) {
    super(`Job ${jobId} cannot move from ${from} to ${to}.`);
    this.name = "JobTransitionError";
    this.jobId = jobId;
  }
}

export class PacketAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PacketAccessError";
  }
}

export class ProviderRequestFailure extends Error {
  readonly providerId: string;
  readonly model: string;

  constructor(providerId: string, model: string, message: string) {
    super(`AI provider ${providerId} (${model}) request failed: ${message}`);
    this.name = "ProviderRequestFailure";
    this.providerId = providerId;
    this.model = model;
  }
}

export class RegistryConflictError extends Error {
  readonly kind: string;
  readonly key: string;

  constructor(kind: string, key: string) {
    super(`A ${kind} named "${key}" is already registered.`);
    this.name = "RegistryConflictError";
    this.kind = kind;
    this.key = key;
  }
}

export function isFlowNotFoundError(error: unknown): error is FlowNotFoundError {
  return error instanceof FlowNotFoundError;
}

export function isStepTypeNotFoundError(error: unknown): error is StepTypeNotFoundError {
  return error instanceof StepTypeNotFoundError;
}

export function isToolNotFoundError(error: unknown): error is ToolNotFoundError {
  return error instanceof ToolNotFoundError;
}

export function isToolClassMissingError(error: unknown): error is ToolClassMissingError {
  return error instanceof ToolClassMissingError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}
