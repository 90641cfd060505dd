// This module holds the immutable name-to-handler registry consulted by the dispatcher.

import type { CallToolResult, McpTool } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';

export type ToolHandlerOutput = CallToolResult | ReadonlyArray<unknown> | string | Record<string, unknown>;

export type ToolHandler = (args: Record<string, unknown>) => Promise<ToolHandlerOutput>;

export interface ToolDescriptor extends McpTool {
  handler: ToolHandler;
}

/**
 * Static registry of tool descriptors built once at startup.
 *
 * Registration order is preserved for discovery. A name registered twice is rejected while the
 * catalog is being built; there is no last-write-wins.
 */
export class ToolCatalog {
  private readonly tools = new Map<string, ToolDescriptor>();
  private readonly definitions: McpTool[];

  public constructor(descriptors: Iterable<ToolDescriptor>) {
    for (const descriptor of descriptors) {
      if (this.tools.has(descriptor.name)) {
        throw new AppError(500, 'catalog_duplicate_tool', `Tool "${descriptor.name}" is registered more than once.`, {
          toolName: descriptor.name
        });
      }
      this.tools.set(descriptor.name, descriptor);
    }

    this.definitions = [...this.tools.values()].map((descriptor) => ({
      name: descriptor.name,
      description: descriptor.description,
      inputSchema: structuredClone(descriptor.inputSchema)
    }));
  }

  public get size(): number {
    return this.tools.size;
  }

  // Definitions, input schemas included, are deep-copied per call so callers cannot mutate the registry.
  public allDefinitions(): McpTool[] {
    return this.definitions.map((definition) => structuredClone(definition));
  }

  public resolve(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  public names(): string[] {
    return [...this.tools.keys()];
  }
}
