/**
 * Tool Registry: register tools by name, list them, execute by name.
 * `execute` is the tool invoker used by the orchestrator and never throws.
 */

import { toErrorMessage } from "../../stage-0-runtime/src/index.js";
import type {
  Tool,
  ToolCallContext,
  ToolOutcome,
  ToolRegistry,
} from "./types.js";
import { validateToolArgs } from "./validate.js";

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, Tool>();

  return {
    register(tool: Tool): void {
      const name = tool.name?.trim();
      if (!name) {
        throw new Error("Tool name is required");
      }
      tools.set(name, tool);
    },

    get(name: string): Tool | undefined {
      return tools.get(name);
    },

    has(name: string): boolean {
      return tools.has(name);
    },

    list(): Tool[] {
      return Array.from(tools.values());
    },

    async execute(
      name: string,
      args: Record<string, unknown>,
      context?: Partial<ToolCallContext>
    ): Promise<ToolOutcome> {
      const tool = tools.get(name);
      if (!tool) {
        return { success: false, error: `Tool not found: ${name}` };
      }

      let callArgs = args;
      if (tool.parameters) {
        const validation = validateToolArgs(args, tool.parameters);
        if (!validation.valid) {
          return {
            success: false,
            error: `Invalid arguments for ${name}: ${(validation.errors ?? []).join("; ")}`,
          };
        }
        callArgs = validation.args;
      }

      const callContext: ToolCallContext = {
        signal: context?.signal ?? new AbortController().signal,
        attempt: context?.attempt ?? 1,
      };

      try {
        const value = await tool.execute(callArgs, callContext);
        return { success: true, value };
      } catch (err) {
        return { success: false, error: toErrorMessage(err) };
      }
    },
  };
}
