import { OracleFailure, errorMessage } from "../errors";
import { createLogger } from "../logger";
import { LANDMARK_TYPES, type DetectedFace, type FaceDetection, type FaceDetector } from "../rekognition/types";
import type { Embedding, EmbeddingOracle } from "./types";

const log = createLogger("landmark-oracle");

export type FacePolicy = "largest" | "single";

export interface LandmarkOracleOptions {
  /** Faces detected with lower confidence are ignored */
  minConfidence?: number;
  facePolicy?: FacePolicy;
}

interface Point {
  x: number;
  y: number;
}

/**
 * Embeds the geometry of a face: the landmark positions in pixels, moved so
 * the midpoint between the eyes is the origin, rotated so the eyes lie on the
 * x axis and scaled so the eyes are one unit apart. Two values per landmark,
 * in LANDMARK_TYPES order.
 */
export class LandmarkEmbeddingOracle implements EmbeddingOracle {
  readonly dimensions = LANDMARK_TYPES.length * 2;
  readonly id = `rekognition-landmarks-v1/${this.dimensions}`;
  private detector: FaceDetector;
  private minConfidence: number;
  private facePolicy: FacePolicy;

  constructor(detector: FaceDetector, options?: LandmarkOracleOptions) {
    this.detector = detector;
    this.minConfidence = options?.minConfidence ?? 90;
    this.facePolicy = options?.facePolicy ?? "largest";
  }

  async embed(imageBytes: Uint8Array): Promise<Embedding | null> {
    let detection: FaceDetection;
    try {
      detection = await this.detector.detectFaces(imageBytes);
    } catch (error) {
      throw new OracleFailure(`Face detection failed: ${errorMessage(error)}`, error);
    }

    const faces = detection.faces.filter((face) => face.confidence >= this.minConfidence);
    const face = this.selectFace(faces);
    if (!face) {
      log.debug({ detected: detection.faces.length, usable: faces.length }, "No usable face");
      return null;
    }

    return landmarkVector(face, detection.width, detection.height);
  }

  private selectFace(faces: DetectedFace[]): DetectedFace | null {
    if (faces.length === 0) return null;
    if (this.facePolicy === "single") {
      return faces.length === 1 ? faces[0] : null;
    }

    let largest = faces[0];
    for (const face of faces.slice(1)) {
      if (area(face) > area(largest)) largest = face;
    }
    return largest;
  }
}

function area(face: DetectedFace): number {
  return face.boundingBox.width * face.boundingBox.height;
}

/**
 * Normalized landmark vector of one face, or null when a landmark is missing
 * or both eyes sit on the same point.
 */
export function landmarkVector(face: DetectedFace, width: number, height: number): number[] | null {
  const points = new Map<string, Point>();
  for (const landmark of face.landmarks) {
    points.set(landmark.type, { x: landmark.x * width, y: landmark.y * height });
  }

  const ordered: Point[] = [];
  for (const type of LANDMARK_TYPES) {
    const point = points.get(type);
    if (!point) return null;
    ordered.push(point);
  }

  const [eyeLeft, eyeRight] = ordered;
  const dx = eyeRight.x - eyeLeft.x;
  const dy = eyeRight.y - eyeLeft.y;
  const eyeDistance = Math.hypot(dx, dy);
  if (eyeDistance === 0) return null;

  const origin = { x: (eyeLeft.x + eyeRight.x) / 2, y: (eyeLeft.y + eyeRight.y) / 2 };
  const cos = dx / eyeDistance;
  const sin = dy / eyeDistance;

  const vector: number[] = [];
  for (const point of ordered) {
    const tx = point.x - origin.x;
    const ty = point.y - origin.y;
    vector.push((tx * cos + ty * sin) / eyeDistance, (-tx * sin + ty * cos) / eyeDistance);
  }
  return vector;
}
