import type pg from "pg";
import { DuplicateError, StorageError, errorMessage, isDuplicateError } from "../shared/errors.js";
import type { NormalizedRecord, StoredRecord } from "../shared/record.js";

export interface LetterStore {
  existsByUrl: (url: string) => Promise<boolean>;
  /** Resolves to the new id, or rejects with `DuplicateError` when the URL is already stored. */
  insert: (record: NormalizedRecord) => Promise<number>;
  listPaginated: (limit: number, offset: number) => Promise<{ records: StoredRecord[]; total: number }>;
  getById: (id: number) => Promise<StoredRecord | null>;
}

type LetterRow = {
  id: number;
  title: string;
  url: string;
  publication_date: string | null;
  summary: string | null;
  content: string;
  created_at: Date | string;
};

const LETTER_COLUMNS = "id, title, url, publication_date::text AS publication_date, summary, content, created_at";

export const toStoredRecord = (row: LetterRow): StoredRecord => ({
  id: Number(row.id),
  title: row.title,
  canonical_url: row.url,
  publication_date: row.publication_date,
  summary: row.summary,
  content: row.content,
  created_at: row.created_at instanceof Date ? row.created_at.toISOString() : row.created_at
});

export const createPgLetterStore = (db: pg.Pool): LetterStore => {
  const existsByUrl = async (url: string): Promise<boolean> => {
    try {
      const result = await db.query("SELECT 1 FROM letters WHERE url = $1 LIMIT 1", [url]);
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      throw new StorageError(`Existence check failed for ${url}: ${errorMessage(error)}`, error);
    }
  };

  const insert = async (record: NormalizedRecord): Promise<number> => {
    const query = `
      INSERT INTO letters (title, url, publication_date, summary, content)
      VALUES ($1, $2, $3, $4, $5)
      ON CONFLICT (url) DO NOTHING
      RETURNING id
    `;
    const values = [record.title, record.canonical_url, record.publication_date, record.summary, record.content];
    let result: pg.QueryResult<{ id: number }>;
    try {
      result = await db.query<{ id: number }>(query, values);
    } catch (error) {
      if (isDuplicateError(error)) {
        throw new DuplicateError(record.canonical_url);
      }
      throw new StorageError(`Insert failed for ${record.canonical_url}: ${errorMessage(error)}`, error);
    }
    const row = result.rows[0];
    if (!row) {
      throw new DuplicateError(record.canonical_url);
    }
    return Number(row.id);
  };

  const listPaginated = async (limit: number, offset: number) => {
    const [countResult, rowsResult] = await Promise.all([
      db.query<{ total: string }>("SELECT COUNT(*) AS total FROM letters"),
      db.query<LetterRow>(
        `
      SELECT ${LETTER_COLUMNS}
      FROM letters
      ORDER BY publication_date DESC NULLS LAST, id DESC
      LIMIT $1 OFFSET $2
    `,
        [limit, offset]
      )
    ]);
    return {
      records: rowsResult.rows.map(toStoredRecord),
      total: Number(countResult.rows[0]?.total ?? 0)
    };
  };

  const getById = async (id: number): Promise<StoredRecord | null> => {
    const result = await db.query<LetterRow>(
      `
      SELECT ${LETTER_COLUMNS}
      FROM letters
      WHERE id = $1
      LIMIT 1
    `,
      [id]
    );
    const row = result.rows[0];
    return row ? toStoredRecord(row) : null;
  };

  return { existsByUrl, insert, listPaginated, getById };
};
