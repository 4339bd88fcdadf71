import type { Config } from "../config";
import { FaceRecognitionClient } from "../rekognition/client";
import { LandmarkEmbeddingOracle } from "./landmarks";
import type { EmbeddingOracle } from "./types";

/** The oracle used by the CLI: Rekognition landmarks turned into a geometry vector. */
export function createEmbeddingOracle(config: Config): EmbeddingOracle {
  return new LandmarkEmbeddingOracle(new FaceRecognitionClient(config), {
    minConfidence: config.rekognition.minConfidence,
    facePolicy: config.rekognition.facePolicy,
  });
}

export type { Embedding, EmbeddingOracle } from "./types";
