import { describe, expect, it } from "vitest";
import { ChunkType } from "./chunkType.js";
import { PngError } from "./errors.js";

const captureError = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
};

describe("ChunkType", () => {
  it("is built from bytes", () => {
    const chunkType = ChunkType.fromBytes(Uint8Array.from([82, 117, 83, 116]));

    expect(chunkType.bytes()).toEqual(Buffer.from([82, 117, 83, 116]));
    expect(chunkType.toString()).toBe("RuSt");
  });

  it("is built from a string", () => {
    const fromString = ChunkType.fromString("RuSt");
    const fromBytes = ChunkType.fromBytes(Buffer.from("RuSt"));

    expect(fromString.equals(fromBytes)).toBe(true);
    expect(fromString.equals(ChunkType.fromString("rust"))).toBe(false);
  });

  it("preserves case", () => {
    expect(ChunkType.fromString("rUsT").toString()).toBe("rUsT");
  });

  it("reads the critical bit from the first letter", () => {
    expect(ChunkType.fromString("RuSt").isCritical()).toBe(true);
    expect(ChunkType.fromString("ruSt").isCritical()).toBe(false);
  });

  it("reads the public bit from the second letter", () => {
    expect(ChunkType.fromString("RUSt").isPublic()).toBe(true);
    expect(ChunkType.fromString("RuSt").isPublic()).toBe(false);
  });

  it("reads the reserved bit from the third letter", () => {
    expect(ChunkType.fromString("RuSt").isReservedBitValid()).toBe(true);
    expect(ChunkType.fromString("Rust").isReservedBitValid()).toBe(false);
  });

  it("reads the safe-to-copy bit from the fourth letter", () => {
    expect(ChunkType.fromString("RuSt").isSafeToCopy()).toBe(true);
    expect(ChunkType.fromString("RuST").isSafeToCopy()).toBe(false);
  });

  it("accepts only private codes with a valid reserved bit", () => {
    const chunkType = ChunkType.fromString("RuSt");
    expect(chunkType.isCritical()).toBe(true);
    expect(chunkType.isPublic()).toBe(false);
    expect(chunkType.isReservedBitValid()).toBe(true);
    expect(chunkType.isSafeToCopy()).toBe(true);
    expect(chunkType.isValid()).toBe(true);

    expect(ChunkType.fromString("Rust").isValid()).toBe(false);
    expect(ChunkType.fromString("IHDR").isValid()).toBe(false);
  });

  it.each(["Ru1t", "Ru t", "RuS", "RuStt", "", "Ruét"])(
    "rejects the string %j",
    (value) => {
      const error = captureError(() => ChunkType.fromString(value));

      expect(error).toBeInstanceOf(PngError);
      expect(error).toMatchObject({ code: "invalid_type_code" });
    }
  );

  it("rejects non-letter bytes", () => {
    const error = captureError(() => ChunkType.fromBytes(Uint8Array.from([82, 117, 0x5b, 116])));

    expect(error).toMatchObject({
      code: "invalid_type_code",
      message: "Invalid chunk type: bytes must be ASCII letters",
    });
  });

  it("rejects byte arrays that are not four bytes long", () => {
    const error = captureError(() => ChunkType.fromBytes(Uint8Array.from([82, 117, 83])));

    expect(error).toMatchObject({
      code: "invalid_type_code",
      message: "Invalid chunk type length: 3",
    });
  });

  it("hands out a copy of its bytes", () => {
    const chunkType = ChunkType.fromString("RuSt");
    const bytes = chunkType.bytes();
    bytes[0] = 0x72;

    expect(chunkType.toString()).toBe("RuSt");
  });
});
