import { ScanConflictError } from "../errors";
import { ScanJobTracker } from "../pipeline/job";
import type {
  CelebritySnapshot,
  DatabaseStatus,
  Identity,
  ScanJob,
} from "../pipeline/types";

export const EMPTY_SNAPSHOT: CelebritySnapshot = Object.freeze({
  identities: Object.freeze([]),
  oracleId: null,
  rootPath: null,
  scannedAt: null,
});

function compareByName(a: Identity, b: Identity): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export function freezeSnapshot(snapshot: CelebritySnapshot): CelebritySnapshot {
  const identities = [...snapshot.identities].sort(compareByName).map((identity) =>
    Object.freeze({
      ...identity,
      embedding: identity.embedding ? Object.freeze([...identity.embedding]) : null,
    })
  );

  return Object.freeze({
    identities: Object.freeze(identities),
    oracleId: snapshot.oracleId,
    rootPath: snapshot.rootPath,
    scannedAt: snapshot.scannedAt,
  });
}

/**
 * Identities known to this process plus the most recent scan job.
 *
 * The identity set is an immutable snapshot that is swapped in one assignment
 * when a scan completes, so readers see either the old or the new set.
 * Only one scan may run at a time.
 */
export class CelebrityDatabase {
  private current: CelebritySnapshot = EMPTY_SNAPSHOT;
  private job: ScanJobTracker;
  private nextJobId: number;

  constructor(options?: { firstJobId?: number }) {
    this.nextJobId = options?.firstJobId ?? 1;
    this.job = new ScanJobTracker(0);
  }

  snapshot(): CelebritySnapshot {
    return this.current;
  }

  scanJob(): ScanJob {
    return this.job.toJSON();
  }

  status(): DatabaseStatus {
    const { identities, scannedAt } = this.current;
    return {
      identityCount: identities.length,
      hasEmbeddings: identities.filter((identity) => identity.embedding !== null).length,
      lastScanTimestamp: scannedAt,
    };
  }

  isScanning(): boolean {
    return this.job.status === "running";
  }

  /** Load a previously persisted snapshot. Not allowed while a scan runs. */
  restore(snapshot: CelebritySnapshot): void {
    this.assertIdle();
    this.current = freezeSnapshot(snapshot);
  }

  /** Claim the database for a new scan and return its running job. */
  beginScan(rootPath: string): ScanJobTracker {
    this.assertIdle();
    const job = new ScanJobTracker(this.nextJobId++);
    job.start(rootPath);
    this.job = job;
    return job;
  }

  /** Publish the scan's identity set and mark the job completed. */
  commit(job: ScanJobTracker, snapshot: CelebritySnapshot): void {
    this.assertOwner(job);
    this.current = freezeSnapshot(snapshot);
    job.complete();
  }

  /** Mark the job failed, leaving the published identity set untouched. */
  abort(job: ScanJobTracker, reason: string): void {
    this.assertOwner(job);
    job.fail(reason);
  }

  private assertIdle(): void {
    if (this.job.status === "running") {
      throw new ScanConflictError(this.job.id);
    }
  }

  private assertOwner(job: ScanJobTracker): void {
    if (job !== this.job) {
      throw new Error(`Scan #${job.id} is not the current scan`);
    }
  }
}
