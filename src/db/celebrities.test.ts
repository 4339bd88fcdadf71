import { ScanConflictError } from "../errors";
import type { CelebritySnapshot, Identity } from "../pipeline/types";
import { CelebrityDatabase } from "./celebrities";

function identity(name: string, embedding: number[] | null): Identity {
  return {
    name,
    folder: `/archive/${name}`,
    imagePath: embedding ? `/archive/${name}/folder.jpg` : null,
    imageHash: null,
    embedding,
  };
}

function snapshot(identities: Identity[]): CelebritySnapshot {
  return { identities, oracleId: "test-oracle", rootPath: "/archive", scannedAt: "2026-01-01T00:00:00.000Z" };
}

describe("CelebrityDatabase", () => {
  it("starts empty with an idle job", () => {
    const database = new CelebrityDatabase();

    expect(database.status()).toEqual({ identityCount: 0, hasEmbeddings: 0, lastScanTimestamp: null });
    expect(database.scanJob()).toMatchObject({ id: 0, status: "idle" });
    expect(database.isScanning()).toBe(false);
  });

  it("numbers scans from firstJobId", () => {
    const database = new CelebrityDatabase({ firstJobId: 5 });

    expect(database.beginScan("/archive").id).toBe(5);
  });

  it("rejects a second scan while one runs", () => {
    const database = new CelebrityDatabase();
    database.beginScan("/archive");

    expect(database.isScanning()).toBe(true);
    expect(() => database.beginScan("/archive")).toThrow(ScanConflictError);
    expect(() => database.restore(snapshot([]))).toThrow("Scan #1 is still running");
  });

  it("publishes the committed identity set sorted by name", () => {
    const database = new CelebrityDatabase();
    const job = database.beginScan("/archive");

    database.commit(job, snapshot([identity("Zoe", [1, 2]), identity("Adam", null)]));

    expect(database.snapshot().identities.map((entry) => entry.name)).toEqual(["Adam", "Zoe"]);
    expect(database.status()).toEqual({
      identityCount: 2,
      hasEmbeddings: 1,
      lastScanTimestamp: "2026-01-01T00:00:00.000Z",
    });
    expect(database.scanJob().status).toBe("completed");
  });

  it("does not share state with the committed input", () => {
    const database = new CelebrityDatabase();
    const job = database.beginScan("/archive");
    const embedding = [1, 2];
    const identities = [identity("Zoe", embedding)];

    database.commit(job, snapshot(identities));
    identities.push(identity("Adam", null));
    embedding[0] = 99;

    const published = database.snapshot();
    expect(published.identities).toHaveLength(1);
    expect(published.identities[0].embedding).toEqual([1, 2]);
    expect(Object.isFrozen(published.identities)).toBe(true);
  });

  it("keeps the previous identity set when a scan is aborted", () => {
    const database = new CelebrityDatabase();
    database.commit(database.beginScan("/archive"), snapshot([identity("Zoe", [1, 2])]));
    const before = database.snapshot();

    const job = database.beginScan("/archive");
    database.abort(job, "root vanished");

    expect(database.snapshot()).toBe(before);
    expect(database.scanJob()).toMatchObject({ id: 2, status: "failed", failureReason: "root vanished" });
  });

  it("refuses updates from a superseded job", () => {
    const database = new CelebrityDatabase();
    const first = database.beginScan("/archive");
    database.abort(first, "stopped");
    database.beginScan("/archive");

    expect(() => database.commit(first, snapshot([]))).toThrow("Scan #1 is not the current scan");
  });

  it("restores a stored snapshot", () => {
    const database = new CelebrityDatabase();
    database.restore(snapshot([identity("Zoe", [3, 4])]));

    expect(database.status().identityCount).toBe(1);
    expect(database.snapshot().oracleId).toBe("test-oracle");
  });
});
