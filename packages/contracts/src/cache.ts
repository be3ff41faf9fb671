export type EntityKind = 'track' | 'release' | 'playlist' | 'chart' | 'artist' | 'label';

export type EntityId = string | number;

/** Upstream ids arrive as strings or integers; both address the same entry */
export const canonicalId = (id: EntityId): string => String(id).trim();

/**
 * Raw records fetched during one top-level operation, keyed by entity kind and
 * canonical id. Created per operation and handed to the normalizers of that
 * operation only.
 */
export class EntityCache<TRecord = unknown> {
  private readonly entries = new Map<string, TRecord>();

  private static key(kind: EntityKind, id: EntityId): string {
    return `${kind}:${canonicalId(id)}`;
  }

  set(kind: EntityKind, id: EntityId, record: TRecord): void {
    this.entries.set(EntityCache.key(kind, id), record);
  }

  get(kind: EntityKind, id: EntityId): TRecord | undefined {
    return this.entries.get(EntityCache.key(kind, id));
  }

  has(kind: EntityKind, id: EntityId): boolean {
    return this.entries.has(EntityCache.key(kind, id));
  }

  get size(): number {
    return this.entries.size;
  }

  ids(kind: EntityKind): string[] {
    const prefix = `${kind}:`;
    const result: string[] = [];
    for (const key of this.entries.keys()) {
      if (key.startsWith(prefix)) {
        result.push(key.slice(prefix.length));
      }
    }
    return result;
  }
}
