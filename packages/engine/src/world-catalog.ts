import { WayfarerError } from "@wayfarer/schemas";
import type { GameGrammar } from "./handlers/types.js";
import type { World } from "./world.js";

/**
 * A playable world: a factory for fresh World instances plus the extra verbs
 * its content needs. `build()` must return new objects on every call.
 */
export interface WorldModule {
  readonly id: string;
  readonly title: string;
  readonly description?: string;
  build(): World;
  /** Register content-specific commands after the built-ins. */
  install?(grammar: GameGrammar): void;
  /** Passage printed before the first room render, if any. */
  readonly intro?: string;
}

export interface WorldSummary {
  id: string;
  title: string;
  description?: string;
}

export class WorldCatalog {
  private modules = new Map<string, WorldModule>();

  constructor(modules: Iterable<WorldModule> = []) {
    for (const mod of modules) this.register(mod);
  }

  register(mod: WorldModule): void {
    if (this.modules.has(mod.id)) {
      throw new WayfarerError("WORLD_BUILD_FAILED", `World "${mod.id}" is already registered`, { world: mod.id });
    }
    this.modules.set(mod.id, mod);
  }

  get(id: string): WorldModule | undefined {
    return this.modules.get(id);
  }

  require(id: string): WorldModule {
    const mod = this.modules.get(id);
    if (!mod) {
      throw new WayfarerError("UNKNOWN_WORLD", `Unknown world "${id}"`, { world: id, available: this.ids() });
    }
    return mod;
  }

  has(id: string): boolean {
    return this.modules.has(id);
  }

  ids(): string[] {
    return [...this.modules.keys()];
  }

  list(): WorldSummary[] {
    return [...this.modules.values()].map((mod) => ({
      id: mod.id,
      title: mod.title,
      ...(mod.description !== undefined ? { description: mod.description } : {}),
    }));
  }
}
