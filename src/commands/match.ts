import ora from "ora";
import { expandPath, loadConfig } from "../config";
import { LookalikeStore, restoreDatabase } from "../db";
import { createEmbeddingOracle } from "../embedding";
import { EmptyDatabaseError, ValidationError } from "../errors";
import { MatchEngine } from "../pipeline/matcher";
import { createSimilarityPolicy } from "../pipeline/similarity";
import { readUpload } from "../sources/upload";
import { printMatchTable } from "../utils/table";
import { failCommand } from "./shared";

interface MatchOptions {
  top?: number;
  json?: boolean;
}

export async function matchCommand(photo: string, options: MatchOptions): Promise<void> {
  const config = loadConfig();
  const spinner = ora();
  const store = new LookalikeStore(config.database.path);

  try {
    const photoPath = expandPath(photo);
    const bytes = await readUpload(photoPath, config.uploads.maxBytes);

    const database = restoreDatabase(store);
    if (database.status().hasEmbeddings === 0) {
      throw new EmptyDatabaseError();
    }

    const oracle = createEmbeddingOracle(config);
    const { oracleId } = database.snapshot();
    if (oracleId !== oracle.id) {
      throw new ValidationError(
        `The database was built with ${oracleId}, this photo would be embedded with ${oracle.id}. Run 'lookalike scan <path> --rescan'.`
      );
    }

    spinner.start("Detecting face...");
    const embedding = await oracle.embed(bytes);
    if (!embedding) {
      spinner.fail(`No face detected in ${photoPath}`);
      process.exitCode = 1;
      return;
    }
    spinner.succeed("Face detected");

    const engine = new MatchEngine(
      database,
      createSimilarityPolicy(config.matching.similarity, config.matching.scale)
    );
    const results = engine.match(embedding, options.top ?? config.matching.topK);

    if (options.json) {
      console.log(JSON.stringify(results, null, 2));
      return;
    }

    console.log(`\nClosest celebrities to ${photoPath}:\n`);
    printMatchTable(results);
  } catch (error) {
    failCommand(spinner, error);
  } finally {
    store.close();
  }
}
