import type { ToolDescriptor, ToolImplementation } from "./types.js";

/**
 * Current tool set of one session. Replacement builds a fresh map and swaps the
 * reference, so a lookup sees either the old set or the new one in full. Calls
 * already holding an implementation keep running against it.
 */
export class ToolRegistry {
  private tools: ReadonlyMap<string, ToolImplementation> = new Map();
  private replacements = 0;

  /** Number of `replaceAll` calls so far. `0` means no tool set was ever defined. */
  get version(): number {
    return this.replacements;
  }

  get size(): number {
    return this.tools.size;
  }

  /** Installs `tools`, discarding the previous set. A later duplicate name wins. */
  replaceAll(tools: Iterable<ToolImplementation>): void {
    const next = new Map<string, ToolImplementation>();
    for (const tool of tools) {
      next.set(tool.descriptor.name, tool);
    }
    this.tools = next;
    this.replacements += 1;
  }

  get(name: string): ToolImplementation | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listAll(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => tool.descriptor);
  }
}
