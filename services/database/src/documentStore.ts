import { DocumentKind, DocumentTypes } from '@ledgerline/shared-types';

export type DocumentFilter<K extends DocumentKind> = Partial<DocumentTypes[K]>;

/**
 * Key-value persistence the services write through. Records are plain JSON values keyed by
 * (kind, id); `list` returns them in first-insertion order.
 */
export interface DocumentStore {
  load<K extends DocumentKind>(kind: K, id: string): Promise<DocumentTypes[K] | undefined>;
  save<K extends DocumentKind>(kind: K, id: string, record: DocumentTypes[K]): Promise<void>;
  /** Shallow equality on every defined filter field. */
  list<K extends DocumentKind>(kind: K, filter?: DocumentFilter<K>): Promise<Array<DocumentTypes[K]>>;
}

export function matchesFilter(record: object, filter: object | undefined): boolean {
  if (!filter) {
    return true;
  }
  const values = new Map<string, unknown>(Object.entries(record));
  return Object.entries(filter).every(([key, expected]) => expected === undefined || values.get(key) === expected);
}

type Collections = { [K in DocumentKind]: Map<string, DocumentTypes[K]> };

export class InMemoryDocumentStore implements DocumentStore {
  private readonly collections: Collections = {
    account: new Map(),
    transaction: new Map(),
    reversal: new Map(),
    period: new Map(),
    obligation: new Map(),
    tax_return: new Map(),
    submission_record: new Map(),
    auth_token: new Map(),
  };

  async load<K extends DocumentKind>(kind: K, id: string): Promise<DocumentTypes[K] | undefined> {
    const collection: Collections[K] = this.collections[kind];
    const record = collection.get(id);
    return record === undefined ? undefined : structuredClone(record);
  }

  async save<K extends DocumentKind>(kind: K, id: string, record: DocumentTypes[K]): Promise<void> {
    const collection: Collections[K] = this.collections[kind];
    // Map keeps the original insertion position when an existing key is overwritten.
    collection.set(id, structuredClone(record));
  }

  async list<K extends DocumentKind>(kind: K, filter?: DocumentFilter<K>): Promise<Array<DocumentTypes[K]>> {
    const collection: Collections[K] = this.collections[kind];
    const results: Array<DocumentTypes[K]> = [];
    for (const record of collection.values()) {
      if (matchesFilter(record, filter)) {
        results.push(structuredClone(record));
      }
    }
    return results;
  }

  /** Number of stored records of a kind. */
  count(kind: DocumentKind): number {
    return this.collections[kind].size;
  }
}
