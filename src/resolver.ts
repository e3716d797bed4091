import { UnresolvedReferenceError } from "./errors.js";
import type { GitHubClient, PageQuery } from "./github/client.js";

/** Mirrored name->id and id->name views; every entry exists in both. */
export class NameIdCache {
  private readonly byName = new Map<string, number>();
  private readonly byId = new Map<number, string>();

  constructor(
    private readonly label: string,
    entries: Iterable<readonly [string, number]> = []
  ) {
    for (const [name, id] of entries) {
      this.set(name, id);
    }
  }

  set(name: string, id: number): void {
    const previousId = this.byName.get(name);
    if (previousId !== undefined) {
      this.byId.delete(previousId);
    }
    const previousName = this.byId.get(id);
    if (previousName !== undefined) {
      this.byName.delete(previousName);
    }
    this.byName.set(name, id);
    this.byId.set(id, name);
  }

  idOf(name: string): number {
    const id = this.byName.get(name);
    if (id === undefined) {
      throw new UnresolvedReferenceError(`Unknown ${this.label} name '${name}'`);
    }
    return id;
  }

  nameOf(id: number): string {
    const name = this.byId.get(id);
    if (name === undefined) {
      throw new UnresolvedReferenceError(`Unknown ${this.label} id ${id}`);
    }
    return name;
  }

  hasName(name: string): boolean {
    return this.byName.has(name);
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  entries(): Array<[string, number]> {
    return [...this.byName.entries()];
  }
}

export type TeamLookup = {
  idOf(name: string): Promise<number>;
};

/**
 * Resolves a named collection (teams, by default) to its name/id mapping with a single
 * fold over the collection, held for the rest of the run. A restricted working set
 * narrows only `names()`; lookups always see the full collection.
 */
export class NameIdResolver implements TeamLookup {
  private cache: NameIdCache | null = null;

  constructor(
    private readonly client: GitHubClient,
    private readonly label: string,
    private readonly path: string,
    private readonly query: PageQuery = {},
    private readonly restrictTo: readonly string[] | null = null
  ) {}

  async mapping(): Promise<NameIdCache> {
    if (this.cache === null) {
      const ids = await this.client.foldNameIds(this.path, this.query);
      this.cache = new NameIdCache(this.label, ids);
    }
    return this.cache;
  }

  async names(): Promise<string[]> {
    const cache = await this.mapping();
    if (this.restrictTo === null) {
      return cache.names();
    }
    for (const name of this.restrictTo) {
      cache.idOf(name);
    }
    return [...this.restrictTo];
  }

  async idOf(name: string): Promise<number> {
    return (await this.mapping()).idOf(name);
  }
}
