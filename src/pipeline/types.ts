import type { Embedding } from "../embedding/types";

export interface Identity {
  name: string;
  folder: string;
  imagePath: string | null;
  /** SHA-256 of the representative image, used to reuse embeddings across scans */
  imageHash: string | null;
  embedding: Embedding | null;
}

/** Immutable identity set published by a completed scan. */
export interface CelebritySnapshot {
  identities: readonly Identity[];
  oracleId: string | null;
  rootPath: string | null;
  scannedAt: string | null;
}

export type ScanStatus = "idle" | "running" | "completed" | "failed";

export type IdentityFailureReason =
  | "no-image"
  | "no-face"
  | "unreadable"
  | "oracle-error"
  | "duplicate-name";

export interface IdentityFailure {
  identity: string;
  reason: IdentityFailureReason;
  message: string;
}

export interface ScanJob {
  id: number;
  status: ScanStatus;
  rootPath: string | null;
  totalIdentities: number;
  processedCount: number;
  successCount: number;
  cachedCount: number;
  errorList: readonly IdentityFailure[];
  startedAt: string | null;
  finishedAt: string | null;
  failureReason: string | null;
}

export interface DatabaseStatus {
  identityCount: number;
  /** Identities carrying an embedding */
  hasEmbeddings: number;
  lastScanTimestamp: string | null;
}

export interface MatchResult {
  name: string;
  imagePath: string | null;
  distance: number;
  similarityScore: number;
}
