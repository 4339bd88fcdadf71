export interface BoundingBox {
  width: number;
  height: number;
  left: number;
  top: number;
}

/** Landmark position as a ratio of image width and height. */
export interface Landmark {
  type: string;
  x: number;
  y: number;
}

export interface DetectedFace {
  boundingBox: BoundingBox;
  confidence: number;
  landmarks: Landmark[];
}

export interface FaceDetection {
  faces: DetectedFace[];
  /** Pixel size of the image the landmark ratios refer to */
  width: number;
  height: number;
}

export interface FaceDetector {
  detectFaces(imageBytes: Uint8Array): Promise<FaceDetection>;
}

/**
 * Landmark types returned by DetectFaces with all attributes, in the order
 * they are laid out in an embedding vector.
 */
export const LANDMARK_TYPES = [
  "eyeLeft",
  "eyeRight",
  "nose",
  "mouthLeft",
  "mouthRight",
  "leftEyeBrowLeft",
  "leftEyeBrowRight",
  "leftEyeBrowUp",
  "rightEyeBrowLeft",
  "rightEyeBrowRight",
  "rightEyeBrowUp",
  "leftEyeLeft",
  "leftEyeRight",
  "leftEyeUp",
  "leftEyeDown",
  "rightEyeLeft",
  "rightEyeRight",
  "rightEyeUp",
  "rightEyeDown",
  "noseLeft",
  "noseRight",
  "mouthUp",
  "mouthDown",
  "leftPupil",
  "rightPupil",
  "upperJawlineLeft",
  "midJawlineLeft",
  "chinBottom",
  "midJawlineRight",
  "upperJawlineRight",
] as const;
