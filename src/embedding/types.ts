export type Embedding = readonly number[];

/**
 * Maps an image to at most one face embedding.
 *
 * `null` means "no usable face", whatever the reason (no face, several faces
 * under a single-face policy, unusable geometry). Failures to process the
 * image at all are thrown as `OracleFailure`.
 *
 * Vectors from oracles with different `id`s live in different spaces and
 * must not be compared.
 */
export interface EmbeddingOracle {
  readonly id: string;
  /** Length of every vector this oracle returns */
  readonly dimensions: number;
  embed(imageBytes: Uint8Array): Promise<Embedding | null>;
}
