import type { DataPacket, Message, ToolMetadata } from "../types.js";
import { buildTextMessage } from "./conversation.js";

const PIPELINE_DIRECTIVE = [
  "You are one step of an automated content pipeline. No human reads this conversation.",
  "Work only from the data packets provided. Do not invent sources or facts.",
  "When a handler tool is available, finish by calling exactly one handler tool with complete parameters.",
  "When no handler tool is available, reply with the processed content as plain text."
].join("\n");

const CHAT_DIRECTIVE = [
  "You are an assistant that operates a content pipeline engine.",
  "Use the available tools when they help answer the request, then answer in plain text."
].join("\n");

export function buildToolDirective(tools: ToolMetadata[]): string {
  if (tools.length === 0) {
    return "";
  }

  const lines = tools.map((tool) => {
    const kind = tool.isHandlerTool ? "handler" : "tool";
    return `- ${tool.declaration.name} (${kind}): ${tool.declaration.description}`;
  });
  return ["Available tools:", ...lines, "Never repeat a call with identical parameters."].join("\n");
}

/** Packets as the model sees them: content, metadata and attachment names only. */
export function renderPacketsForModel(data: DataPacket[]): string {
  const visible = data.map((packet) => ({
    title: packet.content.title,
    body: packet.content.body,
    metadata: packet.metadata,
    attachments: packet.attachments.map((attachment) => attachment.name ?? attachment.path)
  }));
  return JSON.stringify(visible, null, 2);
}

export interface PipelineSeedInput {
  systemPrompt: string;
  userMessage?: string;
  jobContext: string;
  data: DataPacket[];
  tools: ToolMetadata[];
}

export function buildPipelineSeedMessages(input: PipelineSeedInput): Message[] {
  const systemSections = [PIPELINE_DIRECTIVE, input.systemPrompt.trim(), buildToolDirective(input.tools)].filter(
    (section) => section.length > 0
  );
  const messages: Message[] = [buildTextMessage("system", systemSections.join("\n\n"))];

  const request = input.userMessage?.trim() || input.jobContext.trim();
  if (request.length > 0) {
    messages.push(buildTextMessage("user", `ORIGINAL REQUEST (for context): ${request}`));
  }

  if (input.data.length > 0) {
    messages.push(buildTextMessage("user", `Data packets from previous steps (newest first):\n${renderPacketsForModel(input.data)}`));
  } else {
    messages.push(buildTextMessage("user", "No data packets were passed to this step."));
  }

  return messages;
}

export function buildChatSystemMessage(tools: ToolMetadata[]): Message {
  const sections = [CHAT_DIRECTIVE, buildToolDirective(tools)].filter((section) => section.length > 0);
  return buildTextMessage("system", sections.join("\n\n"));
}
