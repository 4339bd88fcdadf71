import { writeFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import ora from "ora";
import { loadConfig, getDefaultConfig, getGlobalConfigDir } from "../config";

export interface InitOptions {
  local?: boolean;
}

export async function initCommand(options: InitOptions = {}): Promise<void> {
  const spinner = ora();

  // Determine config path based on --local flag
  let configPath: string;
  if (options.local) {
    configPath = join(process.cwd(), "config.yaml");
  } else {
    const globalDir = getGlobalConfigDir();
    if (!existsSync(globalDir)) {
      mkdirSync(globalDir, { recursive: true });
    }
    configPath = join(globalDir, "config.yaml");
  }

  if (!existsSync(configPath)) {
    spinner.start("Creating config file...");
    writeFileSync(configPath, getDefaultConfig());
    spinner.succeed(`Created config file: ${configPath}`);
  } else {
    spinner.info(`Config file already exists: ${configPath}`);
  }

  const config = loadConfig();
  spinner.info(`Database: ${config.database.path}`);

  console.log("\nInitialization complete!");
  console.log("\nMake sure AWS credentials are available, for example:");
  console.log("  export AWS_ACCESS_KEY_ID=your_key");
  console.log("  export AWS_SECRET_ACCESS_KEY=your_secret");
  console.log("\nNext steps:");
  console.log("1. Put one folder per celebrity under an archive folder,");
  console.log("   each with a folder.jpg or a *-poster.jpg somewhere inside");
  console.log("2. Run: lookalike scan ~/Pictures/Celebrities");
  console.log("3. Run: lookalike match ~/Pictures/me.jpg");
}
