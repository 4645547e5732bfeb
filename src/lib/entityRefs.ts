// src/lib/entityRefs.ts
import type { EntityRef } from "../types/domain";

export type EntityLoader = (id: string) => Promise<unknown>;

/**
 * Maps a type tag ("submission", "assignment", ...) to the loader that can
 * fetch that entity. Audit entries store only `{ type, id }`; whoever needs
 * the concrete record resolves it here.
 */
export class EntityRefRegistry {
  private readonly loaders = new Map<string, EntityLoader>();

  register(type: string, loader: EntityLoader): this {
    if (this.loaders.has(type)) {
      throw new Error(`Entity type "${type}" is already registered`);
    }
    this.loaders.set(type, loader);
    return this;
  }

  has(type: string): boolean {
    return this.loaders.has(type);
  }

  types(): string[] {
    return [...this.loaders.keys()];
  }

  /** Builds a reference, refusing tags nobody registered. */
  refTo(type: string, id: string): EntityRef {
    if (!this.loaders.has(type)) {
      throw new Error(`Unknown entity type "${type}"`);
    }
    return { type, id };
  }

  async resolve(ref: EntityRef): Promise<unknown> {
    const loader = this.loaders.get(ref.type);
    if (!loader) return null;
    return (await loader(ref.id)) ?? null;
  }
}
