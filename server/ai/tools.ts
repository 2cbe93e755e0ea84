import type { GlobalToolDefinition, HandlerDefinition } from "../engine/contracts.js";
import type { FlowStep, ToolMetadata } from "../types.js";

export interface ToolCatalog {
  getHandler(slug: string): HandlerDefinition | undefined;
  listGlobalTools(): GlobalToolDefinition[];
}

function isGloballyAllowed(name: string, allowedByConfig: readonly string[]): boolean {
  return allowedByConfig.length === 0 || allowedByConfig.includes(name);
}

function handlerToolsForStep(catalog: ToolCatalog, step: FlowStep | undefined): ToolMetadata[] {
  if (!step || step.config.stepType === "ai") {
    return [];
  }

  const handlerConfig = step.config.handlerConfig;
  const handler = catalog.getHandler(step.config.handler);
  if (!handler?.tools) {
    return [];
  }

  return handler.tools(handlerConfig).map((tool) => ({
    declaration: tool.declaration,
    binding: tool.binding,
    isHandlerTool: true,
    handler: handler.slug,
    handlerConfig
  }));
}

function globalTools(catalog: ToolCatalog, include: (name: string) => boolean): ToolMetadata[] {
  return catalog
    .listGlobalTools()
    .filter((tool) => include(tool.declaration.name))
    .map((tool) => ({
      declaration: tool.declaration,
      binding: tool.binding,
      isHandlerTool: false
    }));
}

function dedupeByName(tools: ToolMetadata[]): ToolMetadata[] {
  const seen = new Set<string>();
  return tools.filter((tool) => {
    if (seen.has(tool.declaration.name)) {
      return false;
    }
    seen.add(tool.declaration.name);
    return true;
  });
}

/**
 * Tools for an AI step: the handler tools of the neighbouring steps, then the
 * global tools the step enables. Rebuilt on every invocation.
 */
export function buildPipelineTools(
  catalog: ToolCatalog,
  input: {
    previousStep?: FlowStep;
    nextStep?: FlowStep;
    stepEnabledTools: readonly string[];
    allowedByConfig: readonly string[];
  }
): ToolMetadata[] {
  return dedupeByName([
    ...handlerToolsForStep(catalog, input.nextStep),
    ...handlerToolsForStep(catalog, input.previousStep),
    ...globalTools(
      catalog,
      (name) => input.stepEnabledTools.includes(name) && isGloballyAllowed(name, input.allowedByConfig)
    )
  ]);
}

export function buildChatTools(catalog: ToolCatalog, allowedByConfig: readonly string[]): ToolMetadata[] {
  return dedupeByName(globalTools(catalog, (name) => isGloballyAllowed(name, allowedByConfig)));
}

export function indexTools(tools: ToolMetadata[]): Map<string, ToolMetadata> {
  return new Map(tools.map((tool) => [tool.declaration.name, tool]));
}
