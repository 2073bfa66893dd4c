/**
 * Tool Registry
 *
 * Holds the research tools keyed by their closed set of names. The registry is
 * metadata plus routing: the orchestrator asks it for the menu sent to the
 * model and the executor asks it to resolve a requested name. Adding a tool
 * means registering it here; the loop never changes.
 *
 * @module @citeline/core/tool/registry
 */

import { isToolName, type ToolName } from "@citeline/shared";
import type { ToolSpec } from "../model/model.js";
import type { ResearchTool, ToolParameter } from "./tool.js";
import { researchTools } from "./builtin/index.js";

export interface ToolDescription {
  name: ToolName;
  description: string;
  parameters: readonly ToolParameter[];
}

export class ToolRegistry {
  private readonly tools = new Map<ToolName, ResearchTool>();

  constructor(tools: readonly ResearchTool[] = []) {
    for (const tool of tools) this.register(tool);
  }

  /**
   * Add a tool, replacing any tool already registered under its name.
   */
  register(tool: ResearchTool): this {
    this.tools.set(tool.name, tool);
    return this;
  }

  /**
   * Look up the tool a model requested. Unknown or misspelled names resolve
   * to `undefined`; the executor reports them back to the model.
   */
  resolve(name: string): ResearchTool | undefined {
    return isToolName(name) ? this.tools.get(name) : undefined;
  }

  has(name: string): boolean {
    return this.resolve(name) !== undefined;
  }

  get names(): ToolName[] {
    return Array.from(this.tools.keys());
  }

  /** The tool menu sent to the model, in registration order */
  specs(): ToolSpec[] {
    return Array.from(this.tools.values(), (tool) => tool.toSpec());
  }

  /** Human-readable listing for logs and the HTTP surface */
  describe(): ToolDescription[] {
    return Array.from(this.tools.values(), (tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameterList,
    }));
  }
}

/**
 * Registry preloaded with the four research tools.
 */
export function createResearchToolRegistry(): ToolRegistry {
  return new ToolRegistry(researchTools);
}
