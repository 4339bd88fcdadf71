import { existsSync } from "fs";
import { loadConfig, getConfigPath } from "../config";
import { LookalikeStore, restoreDatabase } from "../db";
import { formatDuration } from "./shared";

export async function statusCommand(): Promise<void> {
  const configPath = getConfigPath();

  console.log("Configuration:");
  if (existsSync(configPath)) {
    console.log(`  ✓ Config file: ${configPath}`);
  } else {
    console.log(`  ○ No config file, using defaults (run 'lookalike init')`);
  }

  const config = loadConfig();

  console.log("\nCelebrity database:");
  if (!existsSync(config.database.path)) {
    console.log(`  ○ Not created yet (run 'lookalike scan <path>')`);
  } else {
    const store = new LookalikeStore(config.database.path);
    try {
      const database = restoreDatabase(store);
      const status = database.status();
      const { rootPath, oracleId } = database.snapshot();

      console.log(`  ✓ Path: ${config.database.path}`);
      console.log(`  ✓ Identities: ${status.identityCount}`);
      console.log(`  ✓ With face embedding: ${status.hasEmbeddings}`);
      if (status.lastScanTimestamp) {
        console.log(`  ✓ Built: ${new Date(status.lastScanTimestamp).toLocaleString()} from ${rootPath}`);
        console.log(`  ✓ Embedding: ${oracleId}`);
      }

      const lastScan = store.getLastScan();
      if (lastScan) {
        console.log("\n  Last scan:");
        console.log(`    #${lastScan.id} ${lastScan.status}${lastScan.failureReason ? ` (${lastScan.failureReason})` : ""}`);
        console.log(
          `    Identities: ${lastScan.processedCount}/${lastScan.totalIdentities}, ${lastScan.successCount} embedded, ${lastScan.cachedCount} cached, ${lastScan.errorList.length} skipped`
        );
        console.log(`    Duration: ${formatDuration(lastScan.durationMs)}`);
      }
    } finally {
      store.close();
    }
  }

  console.log("\nSettings:");
  console.log(`  AWS Region: ${config.aws.region}`);
  console.log(`  Min confidence: ${config.rekognition.minConfidence}%`);
  console.log(`  Face policy: ${config.rekognition.facePolicy}`);
  console.log(`  Scan concurrency: ${config.scanning.concurrency}`);
  console.log(
    `  Similarity: ${config.matching.similarity}${config.matching.scale !== undefined ? ` (scale ${config.matching.scale})` : ""}, top ${config.matching.topK}`
  );
}
