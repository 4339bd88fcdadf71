import Database from "better-sqlite3";
import { z } from "zod";
import { createLogger } from "../logger";
import { CelebrityDatabase } from "./celebrities";
import type { CelebritySnapshot, Identity, ScanJob } from "../pipeline/types";

const log = createLogger("store");

export interface ScanRecord extends ScanJob {
  durationMs: number | null;
}

const embeddingSchema = z.array(z.number()).nullable();

const identityRowSchema = z.object({
  name: z.string(),
  folder: z.string(),
  image_path: z.string().nullable(),
  image_hash: z.string().nullable(),
  embedding: z.string().nullable(),
});

const snapshotRowSchema = z.object({
  oracle_id: z.string().nullable(),
  root_path: z.string().nullable(),
  scanned_at: z.string().nullable(),
});

const failureSchema = z.object({
  identity: z.string(),
  reason: z.enum(["no-image", "no-face", "unreadable", "oracle-error", "duplicate-name"]),
  message: z.string(),
});

const scanRowSchema = z.object({
  id: z.number(),
  status: z.enum(["idle", "running", "completed", "failed"]),
  root_path: z.string().nullable(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable(),
  duration_ms: z.number().nullable(),
  total_identities: z.number(),
  processed_count: z.number(),
  success_count: z.number(),
  cached_count: z.number(),
  errors: z.string(),
  failure_reason: z.string().nullable(),
});

function toIdentity(raw: unknown): Identity {
  const row = identityRowSchema.parse(raw);
  return {
    name: row.name,
    folder: row.folder,
    imagePath: row.image_path,
    imageHash: row.image_hash,
    embedding: row.embedding ? embeddingSchema.parse(JSON.parse(row.embedding)) : null,
  };
}

function toScanRecord(raw: unknown): ScanRecord {
  const row = scanRowSchema.parse(raw);
  return {
    id: row.id,
    status: row.status,
    rootPath: row.root_path,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    durationMs: row.duration_ms,
    totalIdentities: row.total_identities,
    processedCount: row.processed_count,
    successCount: row.success_count,
    cachedCount: row.cached_count,
    errorList: z.array(failureSchema).parse(JSON.parse(row.errors)),
    failureReason: row.failure_reason,
  };
}

/**
 * On-disk copy of the last published snapshot and of the scan history, so
 * separate CLI invocations share one celebrity database.
 */
export class LookalikeStore {
  private db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    if (path !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.migrate();
    log.debug({ path }, "Store opened");
  }

  private migrate(): void {
    this.db.exec(`
      -- Identities of the last completed scan
      CREATE TABLE IF NOT EXISTS identities (
        name TEXT PRIMARY KEY,
        folder TEXT NOT NULL,
        image_path TEXT,
        image_hash TEXT,
        embedding TEXT
      );

      -- Metadata of the last completed scan (single row)
      CREATE TABLE IF NOT EXISTS snapshot (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        oracle_id TEXT,
        root_path TEXT,
        scanned_at TEXT
      );

      -- Every scan run, including failed ones
      CREATE TABLE IF NOT EXISTS scans (
        id INTEGER PRIMARY KEY,
        status TEXT NOT NULL,
        root_path TEXT,
        started_at TEXT,
        finished_at TEXT,
        duration_ms INTEGER,
        total_identities INTEGER NOT NULL DEFAULT 0,
        processed_count INTEGER NOT NULL DEFAULT 0,
        success_count INTEGER NOT NULL DEFAULT 0,
        cached_count INTEGER NOT NULL DEFAULT 0,
        errors TEXT NOT NULL DEFAULT '[]',
        failure_reason TEXT
      );
    `);
  }

  close(): void {
    this.db.close();
  }

  /** Replace the stored snapshot with `snapshot` in one transaction. */
  saveSnapshot(snapshot: CelebritySnapshot): void {
    const insertIdentity = this.db.prepare(`
      INSERT INTO identities (name, folder, image_path, image_hash, embedding)
      VALUES ($name, $folder, $imagePath, $imageHash, $embedding)
    `);
    const upsertMeta = this.db.prepare(`
      INSERT INTO snapshot (id, oracle_id, root_path, scanned_at)
      VALUES (1, $oracleId, $rootPath, $scannedAt)
      ON CONFLICT(id) DO UPDATE SET
        oracle_id = excluded.oracle_id,
        root_path = excluded.root_path,
        scanned_at = excluded.scanned_at
    `);

    const replace = this.db.transaction((next: CelebritySnapshot) => {
      this.db.exec("DELETE FROM identities");
      for (const identity of next.identities) {
        insertIdentity.run({
          name: identity.name,
          folder: identity.folder,
          imagePath: identity.imagePath,
          imageHash: identity.imageHash,
          embedding: identity.embedding ? JSON.stringify(identity.embedding) : null,
        });
      }
      upsertMeta.run({
        oracleId: next.oracleId,
        rootPath: next.rootPath,
        scannedAt: next.scannedAt,
      });
    });

    replace(snapshot);
    log.debug({ identities: snapshot.identities.length }, "Snapshot saved");
  }

  /** The stored snapshot, or null if no scan has completed yet. */
  loadSnapshot(): CelebritySnapshot | null {
    const meta = this.db.prepare("SELECT oracle_id, root_path, scanned_at FROM snapshot WHERE id = 1").get();
    if (meta === undefined) return null;

    const row = snapshotRowSchema.parse(meta);
    const identities = this.db
      .prepare("SELECT * FROM identities ORDER BY name")
      .all()
      .map(toIdentity);

    return {
      identities,
      oracleId: row.oracle_id,
      rootPath: row.root_path,
      scannedAt: row.scanned_at,
    };
  }

  /** Append a finished scan to the history and return its id. */
  recordScan(job: ScanJob): number {
    const durationMs =
      job.startedAt && job.finishedAt
        ? new Date(job.finishedAt).getTime() - new Date(job.startedAt).getTime()
        : null;

    const result = this.db
      .prepare(`
        INSERT INTO scans (
          status, root_path, started_at, finished_at, duration_ms,
          total_identities, processed_count, success_count, cached_count,
          errors, failure_reason
        ) VALUES (
          $status, $rootPath, $startedAt, $finishedAt, $durationMs,
          $total, $processed, $success, $cached,
          $errors, $failureReason
        )
      `)
      .run({
        status: job.status,
        rootPath: job.rootPath,
        startedAt: job.startedAt,
        finishedAt: job.finishedAt,
        durationMs,
        total: job.totalIdentities,
        processed: job.processedCount,
        success: job.successCount,
        cached: job.cachedCount,
        errors: JSON.stringify(job.errorList),
        failureReason: job.failureReason,
      });

    return Number(result.lastInsertRowid);
  }

  getRecentScans(limit: number = 10): ScanRecord[] {
    return this.db
      .prepare("SELECT * FROM scans ORDER BY id DESC LIMIT $limit")
      .all({ limit })
      .map(toScanRecord);
  }

  getScanById(scanId: number): ScanRecord | null {
    const row = this.db.prepare("SELECT * FROM scans WHERE id = $id").get({ id: scanId });
    return row === undefined ? null : toScanRecord(row);
  }

  getLastScan(): ScanRecord | null {
    return this.getRecentScans(1)[0] ?? null;
  }

  /** Remove all scan history. The stored snapshot is kept. */
  clearScans(): number {
    return this.db.prepare("DELETE FROM scans").run().changes;
  }
}

/**
 * Build the in-process database from the stored snapshot. Scan ids continue
 * after the last recorded scan so progress output matches the history.
 */
export function restoreDatabase(store: LookalikeStore): CelebrityDatabase {
  const database = new CelebrityDatabase({ firstJobId: (store.getLastScan()?.id ?? 0) + 1 });
  const snapshot = store.loadSnapshot();
  if (snapshot) {
    database.restore(snapshot);
  }
  return database;
}
