import { describe, expect, it } from "vitest";
import { DuplicateError, StorageError } from "../../shared/errors.js";
import { ingest } from "../ingestor.js";
import { InMemoryLetterStore, letter } from "./fakes.js";

describe("ingest", () => {
  it("stores every unseen letter", async () => {
    const store = new InMemoryLetterStore();
    const batch = [letter("a"), letter("b"), letter("c")];

    const result = await ingest(store, batch);

    expect(result.attempted_count).toBe(3);
    expect(result.inserted_count).toBe(3);
    expect(result.skipped_duplicate_count).toBe(0);
    expect(result.inserted_ids).toEqual([1, 2, 3]);
    expect(result.errors).toEqual([]);
    expect([...store.rows.keys()]).toEqual(batch.map((record) => record.canonical_url));
  });

  it("skips letters already stored and inserts nothing on a second run", async () => {
    const store = new InMemoryLetterStore();
    const batch = [letter("a"), letter("b")];

    await ingest(store, batch);
    const second = await ingest(store, batch);

    expect(second.inserted_count).toBe(0);
    expect(second.skipped_duplicate_count).toBe(2);
    expect(store.rows.size).toBe(2);
  });

  it("keeps the first stored version of a letter", async () => {
    const store = new InMemoryLetterStore([letter("a", { title: "Original" })]);

    await ingest(store, [letter("a", { title: "Changed" })]);

    expect(store.rows.get(letter("a").canonical_url)?.title).toBe("Original");
  });

  it("counts a duplicate raised by the unique constraint as skipped", async () => {
    const store = new InMemoryLetterStore();
    // Another writer stores the letter between the existence check and the insert.
    store.existsByUrl = async () => false;
    store.insert = async (record) => {
      throw new DuplicateError(record.canonical_url);
    };

    const result = await ingest(store, [letter("a")]);

    expect(result.inserted_count).toBe(0);
    expect(result.skipped_duplicate_count).toBe(1);
    expect(result.errors).toEqual([]);
  });

  it("treats a Postgres unique violation as a duplicate", async () => {
    const store = new InMemoryLetterStore();
    store.insert = async () => {
      throw Object.assign(new Error("duplicate key value violates unique constraint"), { code: "23505" });
    };

    const result = await ingest(store, [letter("a")]);

    expect(result.skipped_duplicate_count).toBe(1);
    expect(result.errors).toEqual([]);
  });

  it("records a storage failure and carries on with the batch", async () => {
    const store = new InMemoryLetterStore();
    const insert = store.insert;
    store.insert = async (record) => {
      if (record.canonical_url.endsWith("/b")) {
        throw new StorageError("disk full");
      }
      return insert(record);
    };

    const result = await ingest(store, [letter("a"), letter("b"), letter("c")], { page: 4 });

    expect(result.attempted_count).toBe(3);
    expect(result.inserted_count).toBe(2);
    expect(result.skipped_duplicate_count).toBe(0);
    expect(result.errors).toEqual([
      { stage: "storage", message: "disk full", url: "https://letters.test/letters/b", page: 4 }
    ]);
    expect(result.inserted_count + result.skipped_duplicate_count).toBeLessThanOrEqual(result.attempted_count);
  });

  it("records a failed existence check against that letter only", async () => {
    const store = new InMemoryLetterStore();
    const exists = store.existsByUrl;
    store.existsByUrl = async (url) => {
      if (url.endsWith("/a")) throw new StorageError("connection lost");
      return exists(url);
    };

    const result = await ingest(store, [letter("a"), letter("b")]);

    expect(result.inserted_count).toBe(1);
    expect(result.errors.map((error) => error.url)).toEqual(["https://letters.test/letters/a"]);
  });
});
