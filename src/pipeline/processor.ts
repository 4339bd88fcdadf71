import { constants, type Stats } from "fs";
import { access, readFile, stat } from "fs/promises";
import { resolve } from "path";
import type { CelebrityDatabase } from "../db/celebrities";
import type { Embedding, EmbeddingOracle } from "../embedding/types";
import {
  RootUnavailableError,
  ScanConflictError,
  ValidationError,
  errorMessage,
} from "../errors";
import { createLogger } from "../logger";
import { listIdentityFolders } from "../sources/local";
import type { IdentityFolder, ImageLocator } from "../sources/types";
import { computeFileHash } from "../utils/hash";
import type { ScanJobTracker } from "./job";
import type {
  CelebritySnapshot,
  Identity,
  IdentityFailure,
  IdentityFailureReason,
  ScanJob,
} from "./types";

const log = createLogger("processor");

export interface DirectoryProcessorOptions {
  locator: ImageLocator;
  oracle: EmbeddingOracle;
  /** Identities processed in parallel */
  concurrency?: number;
}

export interface StartScanOptions {
  /** Recompute every embedding instead of reusing those of the previous snapshot */
  rescan?: boolean;
}

/** Result of processing one identity folder (before it is recorded on the job) */
interface IdentityOutcome {
  identity: Identity;
  failure: IdentityFailure | null;
  cached: boolean;
}

interface ScanTask {
  folder: IdentityFolder;
  order: number;
}

function failed(identity: Identity, reason: IdentityFailureReason, message: string): IdentityOutcome {
  return { identity, failure: { identity: identity.name, reason, message }, cached: false };
}

async function validateRoot(rootPath: string): Promise<string> {
  if (!rootPath.trim()) {
    throw new ValidationError("Directory path cannot be empty");
  }

  const resolved = resolve(rootPath);
  let stats: Stats;
  try {
    stats = await stat(resolved);
  } catch (error) {
    throw new ValidationError(`Directory does not exist: ${resolved} (${errorMessage(error)})`);
  }

  if (!stats.isDirectory()) {
    throw new ValidationError(`Path is not a directory: ${resolved}`);
  }
  return resolved;
}

async function assertRootAvailable(rootPath: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await stat(rootPath);
  } catch (error) {
    throw new RootUnavailableError(rootPath, errorMessage(error));
  }
  if (!stats.isDirectory()) {
    throw new RootUnavailableError(rootPath, "no longer a directory");
  }
  try {
    await access(rootPath, constants.R_OK | constants.X_OK);
  } catch (error) {
    throw new RootUnavailableError(rootPath, errorMessage(error));
  }
}

/** Why `embedding` cannot be stored, or null when it is usable. */
function embeddingProblem(embedding: Embedding, dimensions: number): string | null {
  if (embedding.length !== dimensions) {
    return `Embedding has ${embedding.length} dimensions, expected ${dimensions}`;
  }
  if (embedding.some((value) => !Number.isFinite(value))) {
    return "Embedding contains non-finite values";
  }
  return null;
}

/** Embeddings of the previous snapshot, keyed by image hash. */
function embeddingCache(previous: CelebritySnapshot): Map<string, Embedding> {
  const cache = new Map<string, Embedding>();
  for (const identity of previous.identities) {
    if (identity.imageHash && identity.embedding) {
      cache.set(identity.imageHash, identity.embedding);
    }
  }
  return cache;
}

/**
 * Builds the celebrity database from an archive of identity folders.
 *
 * `startScan` validates the root, claims the database and returns right away;
 * the scan itself runs in the background and is observed through `status()`.
 * Per-identity problems end up in the job's error list. Only losing the root
 * folder fails the whole scan, in which case the database keeps its
 * previous identity set.
 */
export class DirectoryProcessor {
  private database: CelebrityDatabase;
  private locator: ImageLocator;
  private oracle: EmbeddingOracle;
  private concurrency: number;
  private active: Promise<void> | null = null;

  constructor(database: CelebrityDatabase, options: DirectoryProcessorOptions) {
    this.database = database;
    this.locator = options.locator;
    this.oracle = options.oracle;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
  }

  async startScan(rootPath: string, options: StartScanOptions = {}): Promise<ScanJob> {
    if (this.database.isScanning()) {
      throw new ScanConflictError(this.database.scanJob().id);
    }

    const resolved = await validateRoot(rootPath);
    const job = this.database.beginScan(resolved);
    const previous = this.database.snapshot();
    log.info({ scanId: job.id, rootPath: resolved, rescan: options.rescan ?? false }, "Scan started");

    const tracked: Promise<void> = this.run(job, resolved, previous, options).finally(() => {
      if (this.active === tracked) this.active = null;
    });
    this.active = tracked;

    return job.toJSON();
  }

  status(): ScanJob {
    return this.database.scanJob();
  }

  /** Resolves with the final job once no scan is running. */
  async waitForIdle(): Promise<ScanJob> {
    while (this.active) {
      await this.active;
    }
    return this.status();
  }

  private async run(
    job: ScanJobTracker,
    rootPath: string,
    previous: CelebritySnapshot,
    options: StartScanOptions
  ): Promise<void> {
    const startTime = Date.now();

    try {
      const folders = await listIdentityFolders(rootPath);
      job.setTotal(folders.length);

      const cache =
        options.rescan || previous.oracleId !== this.oracle.id
          ? new Map<string, Embedding>()
          : embeddingCache(previous);

      // First folder (in sorted order) owns a name; later folders mapping to it are rejected
      const tasks: ScanTask[] = [];
      const claimed = new Set<string>();
      folders.forEach((folder, order) => {
        if (claimed.has(folder.name)) {
          job.recordFailure(
            {
              identity: folder.name,
              reason: "duplicate-name",
              message: `Folder "${folder.folderName}" has the same name as an earlier folder`,
            },
            order
          );
          return;
        }
        claimed.add(folder.name);
        tasks.push({ folder, order });
      });

      const identities = await this.processAll(job, rootPath, tasks, cache);
      await assertRootAvailable(rootPath);

      this.database.commit(job, {
        identities,
        oracleId: this.oracle.id,
        rootPath,
        scannedAt: new Date().toISOString(),
      });

      const final = job.toJSON();
      log.info(
        {
          scanId: job.id,
          durationMs: Date.now() - startTime,
          processed: final.processedCount,
          succeeded: final.successCount,
          cached: final.cachedCount,
          failed: final.errorList.length,
        },
        "Scan completed"
      );
    } catch (error) {
      const reason = errorMessage(error);
      log.error({ scanId: job.id, rootPath, error: reason }, "Scan failed");
      this.database.abort(job, reason);
    }
  }

  /**
   * Process identities with at most `concurrency` in flight.
   * Rejects with the first error that escapes an identity (a lost root).
   */
  private async processAll(
    job: ScanJobTracker,
    rootPath: string,
    tasks: ScanTask[],
    cache: Map<string, Embedding>
  ): Promise<Identity[]> {
    const identities: Identity[] = [];
    const state: { fatal: unknown } = { fatal: null };
    const pending: Array<{ promise: Promise<void>; settled: boolean }> = [];

    const handleOutcome = (task: ScanTask, outcome: IdentityOutcome) => {
      identities.push(outcome.identity);
      if (outcome.failure) {
        log.warn(
          { identity: outcome.failure.identity, reason: outcome.failure.reason, message: outcome.failure.message },
          "Identity skipped"
        );
        job.recordFailure(outcome.failure, task.order);
      } else {
        log.debug({ identity: outcome.identity.name, cached: outcome.cached }, "Identity processed");
        job.recordSuccess({ cached: outcome.cached });
      }
    };

    for (const task of tasks) {
      if (state.fatal) break;

      const entry = { promise: Promise.resolve(), settled: false };
      entry.promise = this.processIdentity(rootPath, task.folder, cache)
        .then((outcome) => handleOutcome(task, outcome))
        .catch((error: unknown) => {
          state.fatal ??= error;
        })
        .finally(() => {
          entry.settled = true;
        });
      pending.push(entry);

      if (pending.length >= this.concurrency) {
        await Promise.race(pending.map((e) => e.promise));
        for (let i = pending.length - 1; i >= 0; i--) {
          if (pending[i].settled) {
            pending.splice(i, 1);
          }
        }
      }
    }

    await Promise.allSettled(pending.map((e) => e.promise));

    if (state.fatal) throw state.fatal;
    return identities;
  }

  private async processIdentity(
    rootPath: string,
    folder: IdentityFolder,
    cache: Map<string, Embedding>
  ): Promise<IdentityOutcome> {
    await assertRootAvailable(rootPath);

    const identity: Identity = {
      name: folder.name,
      folder: folder.path,
      imagePath: null,
      imageHash: null,
      embedding: null,
    };

    let imagePath: string | null;
    try {
      imagePath = await this.locator.locate(folder.path);
    } catch (error) {
      // A folder that cannot be read may mean the whole root went away
      await assertRootAvailable(rootPath);
      return failed(identity, "unreadable", `Cannot read folder: ${errorMessage(error)}`);
    }
    if (!imagePath) {
      return failed(identity, "no-image", "No folder image or poster image found");
    }
    identity.imagePath = imagePath;

    let bytes: Buffer;
    try {
      identity.imageHash = await computeFileHash(imagePath);
      const cached = cache.get(identity.imageHash);
      if (cached) {
        identity.embedding = cached;
        return { identity, failure: null, cached: true };
      }
      bytes = await readFile(imagePath);
    } catch (error) {
      return failed(identity, "unreadable", `Cannot read image: ${errorMessage(error)}`);
    }

    let embedding: Embedding | null;
    try {
      embedding = await this.oracle.embed(bytes);
    } catch (error) {
      return failed(identity, "oracle-error", errorMessage(error));
    }
    if (!embedding) {
      return failed(identity, "no-face", "No face detected");
    }
    const problem = embeddingProblem(embedding, this.oracle.dimensions);
    if (problem) {
      return failed(identity, "oracle-error", problem);
    }

    identity.embedding = embedding;
    return { identity, failure: null, cached: false };
  }
}
