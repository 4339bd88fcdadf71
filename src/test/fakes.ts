import { mkdirSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import type { Embedding, EmbeddingOracle } from "../embedding/types";
import { OracleFailure } from "../errors";

/**
 * Reads the embedding straight out of the image bytes:
 * "face:1,2,3" -> [1, 2, 3], "noface" -> null, anything else -> OracleFailure.
 */
export class TextEmbeddingOracle implements EmbeddingOracle {
  readonly id: string;
  readonly dimensions: number;
  calls: string[] = [];
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;

  constructor(id = "text-oracle", dimensions = 2) {
    this.id = id;
    this.dimensions = dimensions;
  }

  /** Make every embed() call wait until release() is called. */
  hold(): void {
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = null;
    this.openGate = null;
  }

  async embed(imageBytes: Uint8Array): Promise<Embedding | null> {
    const text = Buffer.from(imageBytes).toString("utf-8");
    this.calls.push(text);
    if (this.gate) await this.gate;

    if (text === "noface") return null;
    if (text.startsWith("face:")) {
      return text.slice("face:".length).split(",").map((value) => Number(value));
    }
    throw new OracleFailure(`Cannot decode image (${text})`);
  }
}

/** Write `content` to root/relativePath, creating folders on the way. */
export function writeImage(root: string, relativePath: string, content: string): string {
  const fullPath = join(root, relativePath);
  mkdirSync(dirname(fullPath), { recursive: true });
  writeFileSync(fullPath, content);
  return fullPath;
}
