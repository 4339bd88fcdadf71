import ora from "ora";
import cliProgress from "cli-progress";
import { homedir } from "os";
import { loadConfig } from "../config";
import { LookalikeStore, restoreDatabase, type ScanRecord } from "../db";
import { createEmbeddingOracle } from "../embedding";
import { DirectoryProcessor } from "../pipeline/processor";
import type { ScanJob } from "../pipeline/types";
import { LocalImageLocator } from "../sources/local";
import { confirm } from "../utils/confirm";
import { failCommand, formatDuration } from "./shared";

interface ScanOptions {
  rescan?: boolean;
  verbose?: boolean;
  json?: boolean;
}

const POLL_INTERVAL_MS = 100;

function printErrors(job: ScanJob | ScanRecord): void {
  if (job.errorList.length === 0) return;

  console.log(`\nSkipped identities (${job.errorList.length}):`);
  for (const failure of job.errorList) {
    console.log(`  ✗ ${failure.identity} [${failure.reason}] ${failure.message}`);
  }
}

export async function scanCommand(path: string | undefined, options: ScanOptions): Promise<void> {
  const config = loadConfig();
  const spinner = ora();
  const store = new LookalikeStore(config.database.path);

  try {
    const database = restoreDatabase(store);
    const processor = new DirectoryProcessor(database, {
      locator: new LocalImageLocator({ maxDepth: config.scanning.maxDepth }),
      oracle: createEmbeddingOracle(config),
      concurrency: config.scanning.concurrency,
    });

    spinner.start("Checking archive folder...");
    let started: ScanJob;
    try {
      started = await processor.startScan(path ?? "", { rescan: options.rescan });
    } catch (error) {
      failCommand(spinner, error);
      return;
    }
    spinner.succeed(`[Scan #${started.id}] Scanning ${started.rootPath}${options.rescan ? " (rescan)" : ""}`);

    const progressBar = new cliProgress.SingleBar(
      {
        format: "Scanning |{bar}| {percentage}% | {value}/{total} | Embedded: {success} | Cached: {cached} | Skipped: {skipped}",
        barsize: 20,
        emptyOnZero: true,
      },
      cliProgress.Presets.shades_classic
    );
    progressBar.start(0, 0, { success: 0, cached: 0, skipped: 0 });

    const updateProgress = () => {
      const status = processor.status();
      progressBar.setTotal(status.totalIdentities);
      progressBar.update(status.processedCount, {
        success: status.successCount,
        cached: status.cachedCount,
        skipped: status.errorList.length,
      });
    };
    const timer = setInterval(updateProgress, POLL_INTERVAL_MS);

    let job: ScanJob;
    try {
      job = await processor.waitForIdle();
    } finally {
      clearInterval(timer);
      updateProgress();
      progressBar.stop();
    }

    if (job.status === "completed") {
      store.saveSnapshot(database.snapshot());
    }
    const scanId = store.recordScan(job);

    if (options.json) {
      console.log(JSON.stringify({ ...job, id: scanId }, null, 2));
    }

    if (job.status === "failed") {
      spinner.fail(`Scan #${scanId} failed: ${job.failureReason}`);
      console.error("The previous celebrity database was kept.");
      process.exitCode = 1;
      return;
    }

    if (options.json) return;

    const status = database.status();
    console.log(
      `\nCache: ${job.cachedCount} reused, ${job.successCount - job.cachedCount} new embedding(s)`
    );
    console.log(
      `Database: ${status.identityCount} identities, ${status.hasEmbeddings} with a face embedding`
    );

    if (options.verbose) {
      console.log("\nIdentities:");
      for (const identity of database.snapshot().identities) {
        const marker = identity.embedding ? "✓" : "✗";
        console.log(`  ${marker} ${identity.name} - ${identity.imagePath ?? "(no image)"}`);
      }
    }

    printErrors(job);

    if (status.hasEmbeddings === 0) {
      console.log("\nNo faces were embedded. Check that each folder has a folder.jpg or *-poster.jpg");
      console.log("showing a single, clearly visible face.");
      return;
    }

    console.log("\nNext: lookalike match <photo>");
  } finally {
    store.close();
  }
}

interface ScanListOptions {
  limit?: number;
  json?: boolean;
}

/**
 * scan list - Show scan history
 */
export async function scanListCommand(options: ScanListOptions = {}): Promise<void> {
  const config = loadConfig();
  const store = new LookalikeStore(config.database.path);

  try {
    const scans = store.getRecentScans(options.limit ?? 10);

    if (options.json) {
      console.log(JSON.stringify(scans, null, 2));
      return;
    }

    if (scans.length === 0) {
      console.log("No scans found. Run 'lookalike scan <path>' first.");
      return;
    }

    console.log("ID   Date                 Status     Identities  Embedded  Cached  Skipped  Root");
    console.log("─".repeat(100));

    for (const scan of scans) {
      const dateStr = scan.startedAt ? new Date(scan.startedAt).toLocaleString() : "-";
      const root = scan.rootPath ? scan.rootPath.replace(homedir(), "~") : "(unknown)";
      const truncatedRoot = root.length > 30 ? root.slice(0, 27) + "..." : root;

      console.log(
        `${String(scan.id).padEnd(5)}${dateStr.padEnd(21)}${scan.status.padEnd(11)}${String(scan.totalIdentities).padEnd(12)}${String(scan.successCount).padEnd(10)}${String(scan.cachedCount).padEnd(8)}${String(scan.errorList.length).padEnd(9)}${truncatedRoot}`
      );
    }

    console.log();
    console.log("Use 'lookalike scan show <id>' to view scan details.");
  } finally {
    store.close();
  }
}

interface ScanShowOptions {
  json?: boolean;
}

/**
 * scan show <id> - Show details for a specific scan
 */
export async function scanShowCommand(scanId: string, options: ScanShowOptions = {}): Promise<void> {
  const parsedId = parseInt(scanId, 10);
  if (isNaN(parsedId)) {
    console.error(`Invalid scan ID: ${scanId}`);
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const store = new LookalikeStore(config.database.path);

  try {
    const scan = store.getScanById(parsedId);
    if (!scan) {
      console.log(`Scan #${scanId} not found.`);
      process.exitCode = 1;
      return;
    }

    if (options.json) {
      console.log(JSON.stringify(scan, null, 2));
      return;
    }

    console.log(`Scan #${scan.id} (${scan.startedAt ? new Date(scan.startedAt).toLocaleString() : "not started"})`);
    console.log(`Root: ${scan.rootPath ?? "(unknown)"}`);
    console.log(`Status: ${scan.status}${scan.failureReason ? ` - ${scan.failureReason}` : ""}`);
    console.log(`Duration: ${formatDuration(scan.durationMs)}`);
    console.log(
      `Identities: ${scan.processedCount}/${scan.totalIdentities} processed, ${scan.successCount} embedded (${scan.cachedCount} cached)`
    );

    printErrors(scan);
  } finally {
    store.close();
  }
}

interface ScanClearOptions {
  yes?: boolean;
}

/**
 * scan clear - Remove scan history. The celebrity database itself is kept.
 */
export async function scanClearCommand(options: ScanClearOptions = {}): Promise<void> {
  const config = loadConfig();
  const store = new LookalikeStore(config.database.path);

  try {
    const scans = store.getRecentScans(1);
    if (scans.length === 0) {
      console.log("No scans found. Nothing to clear.");
      return;
    }

    console.log("This will delete the scan history.");
    console.log("Identities and their embeddings will be preserved.");
    console.log();

    if (!options.yes) {
      const confirmed = await confirm("Are you sure?");
      if (!confirmed) {
        console.log("Cancelled.");
        return;
      }
    }

    const cleared = store.clearScans();
    console.log(`Cleared ${cleared} scan(s).`);
  } finally {
    store.close();
  }
}
