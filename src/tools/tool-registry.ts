import type { Tool, ToolSchema } from './tool.js';

/**
 * ToolRegistry - Ordered, name-unique collection of tools
 *
 * Lookups and schema listing do not mutate the registry, so one registry can
 * serve any number of concurrent loop invocations.
 */
export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();

  constructor(tools: Iterable<Tool> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Adds a tool. Names must be unique within the registry.
   */
  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Tools in registration order
   */
  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  /**
   * The schema set published to the model, in registration order
   */
  schemas(): ToolSchema[] {
    return this.list().map(tool => tool.schema);
  }
}
