import type pg from "pg";
import { describe, expect, it, vi } from "vitest";
import { DuplicateError, StorageError } from "../../shared/errors.js";
import { createPgLetterStore, toStoredRecord } from "../letters.js";

const record = {
  title: "Rates Outlook",
  canonical_url: "https://letters.test/letters/rates",
  publication_date: "2025-03-10",
  summary: null,
  content: "Body"
};

const storeWith = (query: ReturnType<typeof vi.fn>) => createPgLetterStore({ query } as unknown as pg.Pool);

describe("toStoredRecord", () => {
  it("maps the url column and timestamps", () => {
    expect(
      toStoredRecord({
        id: 4,
        title: "Rates Outlook",
        url: "https://letters.test/letters/rates",
        publication_date: null,
        summary: "Short",
        content: "Body",
        created_at: new Date("2026-01-02T03:04:05.000Z")
      })
    ).toEqual({
      id: 4,
      title: "Rates Outlook",
      canonical_url: "https://letters.test/letters/rates",
      publication_date: null,
      summary: "Short",
      content: "Body",
      created_at: "2026-01-02T03:04:05.000Z"
    });
  });
});

describe("createPgLetterStore insert", () => {
  it("returns the new id", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [{ id: 7 }], rowCount: 1 });

    await expect(storeWith(query).insert(record)).resolves.toBe(7);
    expect(query.mock.calls[0][1]).toEqual([
      "Rates Outlook",
      "https://letters.test/letters/rates",
      "2025-03-10",
      null,
      "Body"
    ]);
  });

  it("reports a conflicting url as a duplicate", async () => {
    const skipped = vi.fn().mockResolvedValue({ rows: [], rowCount: 0 });
    const violated = vi.fn().mockRejectedValue(Object.assign(new Error("duplicate key"), { code: "23505" }));

    await expect(storeWith(skipped).insert(record)).rejects.toBeInstanceOf(DuplicateError);
    await expect(storeWith(violated).insert(record)).rejects.toBeInstanceOf(DuplicateError);
  });

  it("wraps other failures", async () => {
    const query = vi.fn().mockRejectedValue(new Error("connection lost"));

    const insert = storeWith(query).insert(record);

    await expect(insert).rejects.toBeInstanceOf(StorageError);
    await expect(insert).rejects.toMatchObject({
      message: "Insert failed for https://letters.test/letters/rates: connection lost"
    });
  });
});

describe("createPgLetterStore reads", () => {
  it("pages through letters with a total", async () => {
    const query = vi
      .fn()
      .mockResolvedValueOnce({ rows: [{ total: "3" }] })
      .mockResolvedValueOnce({
        rows: [
          {
            id: 2,
            title: "Rates Outlook",
            url: "https://letters.test/letters/rates",
            publication_date: "2025-03-10",
            summary: null,
            content: "Body",
            created_at: "2026-01-01T00:00:00.000Z"
          }
        ]
      });

    const page = await storeWith(query).listPaginated(1, 1);

    expect(page.total).toBe(3);
    expect(page.records.map((letter) => letter.canonical_url)).toEqual(["https://letters.test/letters/rates"]);
    expect(query.mock.calls[1][1]).toEqual([1, 1]);
  });

  it("returns null for an unknown id", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [] });

    await expect(storeWith(query).getById(99)).resolves.toBeNull();
  });

  it("wraps failed existence checks", async () => {
    const query = vi.fn().mockRejectedValue(new Error("timeout"));

    await expect(storeWith(query).existsByUrl(record.canonical_url)).rejects.toBeInstanceOf(StorageError);
  });
});
