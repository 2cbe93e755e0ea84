import { RegistryConflictError } from "../errors.js";
import type { StepType } from "../types.js";
import type { EngineServices } from "./container.js";
import type { GlobalToolDefinition, HandlerDefinition, Step, ToolImplementation } from "./contracts.js";

export type StepFactory = (services: EngineServices) => Step;

export interface EngineExtension {
  name: string;
  register: (registry: ExtensionRegistry) => void;
}

export class ExtensionRegistry {
  private readonly stepFactories = new Map<string, StepFactory>();
  private readonly handlers = new Map<string, HandlerDefinition>();
  private readonly globalTools = new Map<string, GlobalToolDefinition>();
  private readonly toolImplementations = new Map<string, ToolImplementation>();
  private readonly loadedExtensions: string[] = [];

  registerStepType(stepType: StepType, factory: StepFactory): this {
    if (this.stepFactories.has(stepType)) {
      throw new RegistryConflictError("step type", stepType);
    }
    this.stepFactories.set(stepType, factory);
    return this;
  }

  registerHandler(definition: HandlerDefinition): this {
    if (this.handlers.has(definition.slug)) {
      throw new RegistryConflictError("handler", definition.slug);
    }
    this.handlers.set(definition.slug, definition);
    return this;
  }

  registerGlobalTool(definition: GlobalToolDefinition): this {
    const name = definition.declaration.name;
    if (this.globalTools.has(name)) {
      throw new RegistryConflictError("global tool", name);
    }
    this.globalTools.set(name, definition);
    return this;
  }

  registerToolImplementation(binding: string, implementation: ToolImplementation): this {
    if (this.toolImplementations.has(binding)) {
      throw new RegistryConflictError("tool implementation", binding);
    }
    this.toolImplementations.set(binding, implementation);
    return this;
  }

  resolveStepFactory(stepType: string): StepFactory | undefined {
    return this.stepFactories.get(stepType);
  }

  getHandler(slug: string): HandlerDefinition | undefined {
    return this.handlers.get(slug);
  }

  listGlobalTools(): GlobalToolDefinition[] {
    return [...this.globalTools.values()];
  }

  getToolImplementation(binding: string): ToolImplementation | undefined {
    return this.toolImplementations.get(binding);
  }

  listLoadedExtensions(): string[] {
    return [...this.loadedExtensions];
  }

  load(extensions: EngineExtension[]): this {
    for (const extension of extensions) {
      extension.register(this);
      this.loadedExtensions.push(extension.name);
    }
    return this;
  }
}
