import { DocumentKind, DocumentTypes } from '@ledgerline/shared-types';
import { Queryable } from './database';
import { DocumentFilter, DocumentStore } from './documentStore';

/**
 * DocumentStore over the `documents` table. Filters use JSONB containment, which matches
 * shallow equality for the scalar fields callers filter on.
 */
export class PostgresDocumentStore implements DocumentStore {
  constructor(private readonly database: Queryable) {}

  async load<K extends DocumentKind>(kind: K, id: string): Promise<DocumentTypes[K] | undefined> {
    const result = await this.database.query(
      'SELECT body FROM documents WHERE kind = $1 AND id = $2',
      [kind, id]
    );
    const body: DocumentTypes[K] | undefined = result.rows[0]?.body;
    return body;
  }

  async save<K extends DocumentKind>(kind: K, id: string, record: DocumentTypes[K]): Promise<void> {
    await this.database.query(
      `INSERT INTO documents (kind, id, body)
       VALUES ($1, $2, $3::jsonb)
       ON CONFLICT (kind, id) DO UPDATE SET body = EXCLUDED.body, updated_at = NOW()`,
      [kind, id, JSON.stringify(record)]
    );
  }

  async list<K extends DocumentKind>(kind: K, filter?: DocumentFilter<K>): Promise<Array<DocumentTypes[K]>> {
    const definedFilter = filter
      ? Object.fromEntries(Object.entries(filter).filter(([, value]) => value !== undefined))
      : {};
    const params: unknown[] = [kind];
    let text = 'SELECT body FROM documents WHERE kind = $1';
    if (Object.keys(definedFilter).length > 0) {
      params.push(JSON.stringify(definedFilter));
      text += ' AND body @> $2::jsonb';
    }
    text += ' ORDER BY seq ASC';

    const result = await this.database.query(text, params);
    return result.rows.map((row): DocumentTypes[K] => row.body);
  }
}
