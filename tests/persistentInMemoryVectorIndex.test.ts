import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  PersistentInMemoryVectorIndex,
  parseSnapshotFromDisk,
} from "../src/infra/store/persistentInMemoryVectorIndex.js";
import { makeSection } from "./fixtures.js";

const TEMP_DIR = path.resolve(".tmp-tests-persistent");
const TEMP_FILE = path.join(TEMP_DIR, "persistent-index-test.json");

describe("PersistentInMemoryVectorIndex", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("restores indexed sections after restart", async () => {
    const first = new PersistentInMemoryVectorIndex(TEMP_FILE, { maxBytes: 1_000_000 });
    await first.upsertSource({
      sourceId: "346.txt",
      docType: "statute",
      chunks: [
        {
          chunk: makeSection("346.63", "346.63 Operating while intoxicated."),
          embedding: [0.1, 0.2, 0.3],
        },
      ],
    });
    await first.close();

    const second = new PersistentInMemoryVectorIndex(TEMP_FILE, { maxBytes: 1_000_000 });

    const sources = await second.listSources();
    expect(sources.map((source) => source.id)).toEqual(["346.txt"]);
    expect((await second.getByCitationKey("346.63"))?.text).toBe("346.63 Operating while intoxicated.");

    const hits = await second.search({ query: "owi", queryEmbedding: [0.1, 0.2, 0.3], k: 3 });
    expect(hits).toHaveLength(1);
    expect(hits[0].semanticScore).toBeCloseTo(1, 10);

    const info = await second.getStorageInfo();
    expect(info.exists).toBe(true);
    expect(info.format_version).toBe(1);
    expect(info.size_bytes).toBeGreaterThan(0);
  });

  it("enforces the snapshot size limit", async () => {
    const index = new PersistentInMemoryVectorIndex(TEMP_FILE, { maxBytes: 120 });

    await expect(
      index.upsertSource({
        sourceId: "346.txt",
        docType: "statute",
        chunks: [{ chunk: makeSection("346.63", "A".repeat(200)), embedding: null }],
      }),
    ).rejects.toThrow("exceeds size limit");
  });

  it("reports a missing snapshot file", async () => {
    const index = new PersistentInMemoryVectorIndex(TEMP_FILE, { maxBytes: 1000 });

    expect(await index.getStorageInfo()).toMatchObject({ exists: false, size_bytes: 0, utilization_ratio: 0 });
  });
});

describe("parseSnapshotFromDisk", () => {
  it("rejects other format versions", () => {
    expect(() =>
      parseSnapshotFromDisk({ format_version: 2, saved_at: "2026-01-01T00:00:00.000Z", snapshot: {} }),
    ).toThrow("Unsupported in-memory index format version: 2. Expected 1.");
  });

  it("rejects malformed snapshots", () => {
    expect(() => parseSnapshotFromDisk({ format_version: 1 })).toThrow(
      "Invalid in-memory index snapshot format.",
    );
    expect(() =>
      parseSnapshotFromDisk({
        format_version: 1,
        saved_at: "2026-01-01T00:00:00.000Z",
        snapshot: { sources: [{ id: "x", path: "x", docType: "regulation" }], chunksBySourceId: {} },
      }),
    ).toThrow("Invalid in-memory index snapshot format.");
  });
});
