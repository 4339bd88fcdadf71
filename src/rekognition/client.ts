import {
  RekognitionClient,
  DetectFacesCommand,
  type FaceDetail,
} from "@aws-sdk/client-rekognition";
import Bottleneck from "bottleneck";
import sharp from "sharp";
import type { BoundingBox, DetectedFace, FaceDetection, FaceDetector, Landmark } from "./types";
import { createLogger } from "../logger";
import type { Config } from "../config";

const log = createLogger("rekognition");

/** Formats DetectFaces accepts as-is. Everything else is re-encoded to JPEG. */
const NATIVE_FORMATS = new Set(["jpeg", "png"]);

interface PreparedImage {
  bytes: Uint8Array;
  width: number;
  height: number;
}

export class FaceRecognitionClient implements FaceDetector {
  private client: RekognitionClient;
  private limiter: Bottleneck;
  private config: Config;

  constructor(config: Config) {
    this.config = config;
    this.client = new RekognitionClient({ region: config.aws.region });

    this.limiter = new Bottleneck({
      minTime: config.rekognition.rateLimit.minTime,
      maxConcurrent: config.rekognition.rateLimit.maxConcurrent,
    });
  }

  async detectFaces(imageBytes: Uint8Array): Promise<FaceDetection> {
    const image = await this.prepareImage(imageBytes);

    return this.limiter.schedule(async () => {
      const response = await this.client.send(
        new DetectFacesCommand({
          Image: { Bytes: image.bytes },
          Attributes: ["ALL"],
        })
      );

      const faces = (response.FaceDetails ?? []).map((detail) => this.convertFace(detail));
      log.debug(
        { faceCount: faces.length, width: image.width, height: image.height },
        "Faces detected"
      );

      return { faces, width: image.width, height: image.height };
    });
  }

  private async prepareImage(imageBytes: Uint8Array): Promise<PreparedImage> {
    const { maxDimension, jpegQuality } = this.config.imageProcessing;
    const metadata = await sharp(imageBytes).metadata();
    const width = metadata.width ?? 0;
    const height = metadata.height ?? 0;

    log.debug(
      { format: metadata.format, width, height, size: imageBytes.length },
      "Preparing image"
    );

    const tooLarge = width > maxDimension || height > maxDimension;
    if (!tooLarge && metadata.format && NATIVE_FORMATS.has(metadata.format)) {
      return { bytes: imageBytes, width, height };
    }

    let pipeline = sharp(imageBytes);
    if (tooLarge) {
      log.debug({ width, height, maxDimension }, "Resizing large image");
      pipeline = pipeline.resize(maxDimension, maxDimension, { fit: "inside" });
    }

    const { data, info } = await pipeline
      .jpeg({ quality: jpegQuality })
      .toBuffer({ resolveWithObject: true });

    return { bytes: data, width: info.width, height: info.height };
  }

  private convertFace(detail: FaceDetail): DetectedFace {
    const landmarks: Landmark[] = [];
    for (const landmark of detail.Landmarks ?? []) {
      if (landmark.Type && landmark.X !== undefined && landmark.Y !== undefined) {
        landmarks.push({ type: landmark.Type, x: landmark.X, y: landmark.Y });
      }
    }

    return {
      boundingBox: this.convertBoundingBox(detail.BoundingBox),
      confidence: detail.Confidence ?? 0,
      landmarks,
    };
  }

  private convertBoundingBox(box?: {
    Width?: number;
    Height?: number;
    Left?: number;
    Top?: number;
  }): BoundingBox {
    return {
      width: box?.Width ?? 0,
      height: box?.Height ?? 0,
      left: box?.Left ?? 0,
      top: box?.Top ?? 0,
    };
  }
}
