// src/core/natives/registry.ts
// Lookup table of native descriptors, built once at start-up

import type { Effect, NativeDescriptor } from "./types";

export class NativeRegistry {
  private descriptors: Map<string, NativeDescriptor> = new Map();
  private byEffect: Map<Effect, Set<string>> = new Map();

  /**
   * Register a descriptor. Throws on duplicate ids.
   */
  register(descriptor: NativeDescriptor): void {
    if (this.descriptors.has(descriptor.id)) {
      throw new Error(`Native already registered: ${descriptor.id}`);
    }

    this.descriptors.set(descriptor.id, descriptor);
    for (const effect of descriptor.effects) {
      let ids = this.byEffect.get(effect);
      if (!ids) {
        ids = new Set();
        this.byEffect.set(effect, ids);
      }
      ids.add(descriptor.id);
    }
  }

  get(id: string): NativeDescriptor | undefined {
    return this.descriptors.get(id);
  }

  has(id: string): boolean {
    return this.descriptors.has(id);
  }

  getAll(): NativeDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  getByEffect(effect: Effect): NativeDescriptor[] {
    const ids = this.byEffect.get(effect);
    if (!ids) return [];
    return this.getAll().filter(d => ids.has(d.id));
  }

  /**
   * Simple text search (id, summary, detail).
   */
  search(query: string): NativeDescriptor[] {
    const q = query.toLowerCase();
    return this.getAll().filter(d =>
      d.id.toLowerCase().includes(q) ||
      d.doc.summary.toLowerCase().includes(q) ||
      (d.doc.detail?.toLowerCase().includes(q) ?? false)
    );
  }

  /**
   * Validate descriptors for required fields and consistency.
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (const desc of this.descriptors.values()) {
      if (desc.id.length === 0) {
        errors.push(`<anonymous>: missing id`);
      }
      if (!desc.doc.summary) {
        errors.push(`${desc.id}: missing doc.summary`);
      }
      if (!desc.version) {
        errors.push(`${desc.id}: missing version`);
      }
      if (desc.effects.length === 0) {
        errors.push(`${desc.id}: no effects declared`);
      }
      if (desc.effects.includes("Sink") && desc.effects.includes("Pure")) {
        errors.push(`${desc.id}: can't be both Pure and Sink`);
      }
      const seen = new Set<string>();
      for (const p of desc.signature.params) {
        if (seen.has(p.locator)) {
          errors.push(`${desc.id}: parameter '${p.locator}' listed twice`);
        }
        seen.add(p.locator);
      }
    }

    return { valid: errors.length === 0, errors };
  }

  static of(descriptors: Iterable<NativeDescriptor>): NativeRegistry {
    const registry = new NativeRegistry();
    for (const desc of descriptors) {
      registry.register(desc);
    }
    return registry;
  }
}
