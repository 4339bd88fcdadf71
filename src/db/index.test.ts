import type { ScanJob } from "../pipeline/types";
import { LookalikeStore, restoreDatabase } from "./index";

function finishedJob(overrides: Partial<ScanJob> = {}): ScanJob {
  return {
    id: 1,
    status: "completed",
    rootPath: "/archive",
    totalIdentities: 2,
    processedCount: 2,
    successCount: 1,
    cachedCount: 0,
    errorList: [{ identity: "Bob", reason: "no-face", message: "No face detected" }],
    startedAt: "2026-01-01T00:00:00.000Z",
    finishedAt: "2026-01-01T00:00:02.500Z",
    failureReason: null,
    ...overrides,
  };
}

describe("LookalikeStore", () => {
  let store: LookalikeStore;

  beforeEach(() => {
    store = new LookalikeStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  describe("snapshots", () => {
    it("returns null before any snapshot is saved", () => {
      expect(store.loadSnapshot()).toBeNull();
    });

    it("round-trips identities and metadata", () => {
      store.saveSnapshot({
        identities: [
          { name: "Zoe", folder: "/archive/Zoe", imagePath: "/archive/Zoe/folder.jpg", imageHash: "abc", embedding: [0.5, -1] },
          { name: "Bob", folder: "/archive/Bob", imagePath: null, imageHash: null, embedding: null },
        ],
        oracleId: "test-oracle",
        rootPath: "/archive",
        scannedAt: "2026-01-01T00:00:03.000Z",
      });

      expect(store.loadSnapshot()).toEqual({
        identities: [
          { name: "Bob", folder: "/archive/Bob", imagePath: null, imageHash: null, embedding: null },
          { name: "Zoe", folder: "/archive/Zoe", imagePath: "/archive/Zoe/folder.jpg", imageHash: "abc", embedding: [0.5, -1] },
        ],
        oracleId: "test-oracle",
        rootPath: "/archive",
        scannedAt: "2026-01-01T00:00:03.000Z",
      });
    });

    it("replaces the previous identity set", () => {
      const base = { oracleId: "test-oracle", rootPath: "/archive", scannedAt: null };
      store.saveSnapshot({
        ...base,
        identities: [{ name: "Old", folder: "/archive/Old", imagePath: null, imageHash: null, embedding: null }],
      });
      store.saveSnapshot({
        ...base,
        identities: [{ name: "New", folder: "/archive/New", imagePath: null, imageHash: null, embedding: [1] }],
      });

      const loaded = store.loadSnapshot();
      expect(loaded?.identities.map((identity) => identity.name)).toEqual(["New"]);
    });
  });

  describe("scan history", () => {
    it("records scans with their duration and errors", () => {
      const id = store.recordScan(finishedJob());

      expect(store.getScanById(id)).toEqual({
        ...finishedJob({ id }),
        durationMs: 2500,
      });
    });

    it("leaves the duration empty for unfinished timestamps", () => {
      const id = store.recordScan(finishedJob({ status: "failed", finishedAt: null, failureReason: "root vanished" }));

      expect(store.getScanById(id)).toMatchObject({ status: "failed", durationMs: null, failureReason: "root vanished" });
    });

    it("lists recent scans newest first", () => {
      const first = store.recordScan(finishedJob());
      const second = store.recordScan(finishedJob({ successCount: 2 }));

      expect(store.getRecentScans().map((scan) => scan.id)).toEqual([second, first]);
      expect(store.getRecentScans(1).map((scan) => scan.id)).toEqual([second]);
      expect(store.getLastScan()?.successCount).toBe(2);
    });

    it("returns null for unknown scans", () => {
      expect(store.getScanById(42)).toBeNull();
      expect(store.getLastScan()).toBeNull();
    });

    it("clears history but keeps the snapshot", () => {
      store.saveSnapshot({ identities: [], oracleId: "test-oracle", rootPath: "/archive", scannedAt: null });
      store.recordScan(finishedJob());
      store.recordScan(finishedJob());

      expect(store.clearScans()).toBe(2);
      expect(store.getRecentScans()).toEqual([]);
      expect(store.loadSnapshot()?.oracleId).toBe("test-oracle");
    });
  });
});

describe("restoreDatabase", () => {
  it("loads the stored snapshot and continues scan numbering", () => {
    const store = new LookalikeStore(":memory:");
    store.saveSnapshot({
      identities: [{ name: "Zoe", folder: "/archive/Zoe", imagePath: null, imageHash: null, embedding: [1, 2] }],
      oracleId: "test-oracle",
      rootPath: "/archive",
      scannedAt: "2026-01-01T00:00:03.000Z",
    });
    store.recordScan(finishedJob());
    store.recordScan(finishedJob());

    const database = restoreDatabase(store);

    expect(database.status()).toEqual({
      identityCount: 1,
      hasEmbeddings: 1,
      lastScanTimestamp: "2026-01-01T00:00:03.000Z",
    });
    expect(database.beginScan("/archive").id).toBe(3);
    store.close();
  });

  it("starts empty without a stored snapshot", () => {
    const store = new LookalikeStore(":memory:");

    expect(restoreDatabase(store).status().identityCount).toBe(0);
    store.close();
  });
});
