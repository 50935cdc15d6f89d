/**
 * In-process cache of loaded flow definitions, keyed by flow name.
 *
 * Lifetime is the owning process: entries are never evicted, so a definition
 * file changed on disk under an already-cached name is not picked up until
 * restart. Concurrent first loads of one name may both write; the last write
 * wins and both values come from the same file.
 */
import type { FlowDefinition } from '@flowqa/shared';

export class FlowCache {
  private readonly entries = new Map<string, FlowDefinition>();

  get(name: string): FlowDefinition | undefined {
    return this.entries.get(name);
  }

  set(name: string, flow: FlowDefinition): void {
    this.entries.set(name, flow);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }
}
