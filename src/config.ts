import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";

const configSchema = z.object({
  aws: z
    .object({
      region: z.string().default("us-east-1"),
    })
    .default({}),
  rekognition: z
    .object({
      minConfidence: z.number().min(0).max(100).default(90),
      facePolicy: z.enum(["largest", "single"]).default("largest"),
      rateLimit: z
        .object({
          minTime: z.number().min(0).default(200),
          maxConcurrent: z.number().min(1).max(20).default(5),
        })
        .default({}),
    })
    .default({}),
  imageProcessing: z
    .object({
      maxDimension: z.number().min(100).max(10000).default(4096),
      jpegQuality: z.number().min(1).max(100).default(90),
    })
    .default({}),
  scanning: z
    .object({
      concurrency: z.number().int().min(1).max(10).default(5),
      maxDepth: z.number().int().min(1).max(256).default(32),
    })
    .default({}),
  matching: z
    .object({
      topK: z.number().int().min(1).max(100).default(10),
      similarity: z.enum(["exponential", "linear"]).default("exponential"),
      scale: z.number().positive().optional(),
    })
    .default({}),
  uploads: z
    .object({
      maxBytes: z.number().int().positive().default(16 * 1024 * 1024),
    })
    .default({}),
  database: z
    .object({
      path: z.string().default(".lookalike.db"),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

const CONFIG_FILENAME = "config.yaml";
const GLOBAL_CONFIG_DIR = join(homedir(), ".config", "lookalike");

export function expandPath(p: string): string {
  if (p.startsWith("~/")) {
    return join(homedir(), p.slice(2));
  }
  return resolve(p);
}

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}

export function getConfigPath(): string {
  const localPath = join(process.cwd(), CONFIG_FILENAME);
  if (existsSync(localPath)) {
    return localPath;
  }
  return join(GLOBAL_CONFIG_DIR, CONFIG_FILENAME);
}

/**
 * Validate a raw (already YAML-decoded) config object and fill defaults.
 * An empty document yields the default configuration.
 */
export function parseConfig(raw: unknown): Config {
  const config = configSchema.parse(raw ?? {});
  config.database.path = expandPath(config.database.path);
  return config;
}

export function loadConfig(): Config {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return parseConfig({});
  }

  const content = readFileSync(configPath, "utf-8");
  return parseConfig(parseYaml(content));
}

export function getDefaultConfig(): string {
  return `# lookalike Configuration

aws:
  region: us-east-1

rekognition:
  minConfidence: 90         # Ignore detected faces below this confidence
  facePolicy: largest       # "largest" face in the photo, or "single" (skip photos with several faces)
  rateLimit:
    minTime: 200            # Minimum ms between requests
    maxConcurrent: 5        # Max concurrent API calls

imageProcessing:
  maxDimension: 4096        # Max pixel dimension before resizing
  jpegQuality: 90           # Quality for JPEG conversion (1-100)

scanning:
  concurrency: 5            # Identities processed in parallel (1-10)
  maxDepth: 32              # Max folder depth searched for poster images

matching:
  topK: 10                  # Number of matches shown
  similarity: exponential   # "exponential" (100 * e^(-d/scale)) or "linear" (100 - d * scale)
  # scale: 1                # Defaults: 1 for exponential, 100 for linear

uploads:
  maxBytes: 16777216        # 16 MiB

database:
  path: .lookalike.db
`;
}
