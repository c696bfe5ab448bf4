import { DuplicateError } from "../../shared/errors.js";
import type { NormalizedRecord, StoredRecord } from "../../shared/record.js";
import type { LetterStore } from "../../store/letters.js";

/** Letter store backed by a Map, enforcing URL uniqueness the way the database does. */
export class InMemoryLetterStore implements LetterStore {
  readonly rows = new Map<string, StoredRecord>();
  private nextId = 1;

  constructor(seed: NormalizedRecord[] = []) {
    for (const record of seed) {
      this.put(record);
    }
  }

  private put(record: NormalizedRecord): number {
    const id = this.nextId;
    this.nextId += 1;
    this.rows.set(record.canonical_url, { ...record, id, created_at: "2026-01-01T00:00:00.000Z" });
    return id;
  }

  existsByUrl = async (url: string) => this.rows.has(url);

  insert = async (record: NormalizedRecord) => {
    if (this.rows.has(record.canonical_url)) {
      throw new DuplicateError(record.canonical_url);
    }
    return this.put(record);
  };

  listPaginated = async (limit: number, offset: number) => {
    const records = [...this.rows.values()];
    return { records: records.slice(offset, offset + limit), total: records.length };
  };

  getById = async (id: number) => [...this.rows.values()].find((row) => row.id === id) ?? null;
}

export const letter = (slug: string, overrides: Partial<NormalizedRecord> = {}): NormalizedRecord => ({
  title: `Letter ${slug}`,
  canonical_url: `https://letters.test/letters/${slug}`,
  publication_date: "2025-03-01",
  summary: null,
  content: `Body of ${slug}`,
  ...overrides
});
