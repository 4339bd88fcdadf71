import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ValidationError } from "../errors";
import { readUpload } from "./upload";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "lookalike-upload-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("readUpload", () => {
  it("returns the bytes of an accepted photo", async () => {
    const photo = join(dir, "me.JPG");
    writeFileSync(photo, "face:1,2");

    const bytes = await readUpload(photo, 1024);

    expect(bytes.toString("utf-8")).toBe("face:1,2");
  });

  it("rejects other formats", async () => {
    const notes = join(dir, "notes.txt");
    writeFileSync(notes, "x");

    await expect(readUpload(notes, 1024)).rejects.toThrow(
      "Unsupported image format: notes.txt (accepted: jpg, jpeg, png, gif, bmp, webp)"
    );
  });

  it("rejects photos over the size limit", async () => {
    const photo = join(dir, "big.png");
    writeFileSync(photo, Buffer.alloc(2048));

    await expect(readUpload(photo, 1024)).rejects.toThrow("Photo is too large: 2.0 KiB (limit 1.0 KiB)");
  });

  it("rejects missing files and directories", async () => {
    mkdirSync(join(dir, "album.jpg"));

    await expect(readUpload(join(dir, "missing.jpg"), 1024)).rejects.toThrow(ValidationError);
    await expect(readUpload(join(dir, "album.jpg"), 1024)).rejects.toThrow(`Not a file: ${join(dir, "album.jpg")}`);
  });
});
