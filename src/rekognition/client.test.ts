import { RekognitionClient } from "@aws-sdk/client-rekognition";
import sharp from "sharp";
import { parseConfig } from "../config";
import { LandmarkEmbeddingOracle } from "../embedding/landmarks";
import { OracleFailure } from "../errors";
import { FaceRecognitionClient } from "./client";

async function redSquare(): Promise<Buffer> {
  return sharp({
    create: { width: 8, height: 8, channels: 3, background: { r: 255, g: 0, b: 0 } },
  })
    .png()
    .toBuffer();
}

function invalidImageError(): Error {
  return Object.assign(new Error("Request has invalid image format"), {
    name: "InvalidImageFormatException",
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("FaceRecognitionClient", () => {
  it("passes on images Rekognition cannot decode", async () => {
    vi.spyOn(RekognitionClient.prototype, "send").mockRejectedValue(invalidImageError());
    const client = new FaceRecognitionClient(parseConfig({}));

    await expect(client.detectFaces(await redSquare())).rejects.toThrow("Request has invalid image format");
  });

  it("surfaces undecodable images as oracle failures", async () => {
    vi.spyOn(RekognitionClient.prototype, "send").mockRejectedValue(invalidImageError());
    const oracle = new LandmarkEmbeddingOracle(new FaceRecognitionClient(parseConfig({})));

    const result = oracle.embed(await redSquare());

    await expect(result).rejects.toThrow(OracleFailure);
    await expect(result).rejects.toThrow("Face detection failed: Request has invalid image format");
  });
});
