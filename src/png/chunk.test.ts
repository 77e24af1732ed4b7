import { describe, expect, it } from "vitest";
import { Chunk } from "./chunk.js";
import { ChunkType } from "./chunkType.js";
import { PngError } from "./errors.js";

const MESSAGE = "This is where your secret message will be!";
const MESSAGE_CRC = 2882656334;

const captureError = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
};

// [length][type][data][crc] with every field supplied by the caller.
const rawChunk = (length: number, chunkType: string, data: Buffer, crc: number): Buffer => {
  const lengthField = Buffer.alloc(4);
  lengthField.writeUInt32BE(length, 0);
  const crcField = Buffer.alloc(4);
  crcField.writeUInt32BE(crc, 0);
  return Buffer.concat([lengthField, Buffer.from(chunkType, "ascii"), data, crcField]);
};

const testingChunk = (): Chunk =>
  Chunk.fromBytes(rawChunk(42, "RuSt", Buffer.from(MESSAGE), MESSAGE_CRC));

describe("Chunk", () => {
  it("computes length and crc on construction", () => {
    const chunk = new Chunk(ChunkType.fromString("RuSt"), Buffer.from(MESSAGE));

    expect(chunk.length).toBe(42);
    expect(chunk.crc).toBe(MESSAGE_CRC);
    expect(chunk.chunkType.toString()).toBe("RuSt");
    expect(chunk.dataAsString()).toBe(MESSAGE);
  });

  it("is built from strings", () => {
    const chunk = Chunk.fromStrings("RuSt", MESSAGE);

    expect(chunk.equals(testingChunk())).toBe(true);
  });

  it("rejects an invalid type string", () => {
    const error = captureError(() => Chunk.fromStrings("Ru1t", MESSAGE));

    expect(error).toBeInstanceOf(PngError);
    expect(error).toMatchObject({ code: "invalid_type_code" });
  });

  it("parses valid bytes", () => {
    const chunk = testingChunk();

    expect(chunk.length).toBe(42);
    expect(chunk.chunkType.toString()).toBe("RuSt");
    expect(chunk.dataAsString()).toBe(MESSAGE);
    expect(chunk.crc).toBe(MESSAGE_CRC);
  });

  it("rejects a stored crc that does not match", () => {
    const error = captureError(() =>
      Chunk.fromBytes(rawChunk(42, "RuSt", Buffer.from(MESSAGE), MESSAGE_CRC - 1))
    );

    expect(error).toMatchObject({
      code: "checksum_mismatch",
      context: { chunkType: "RuSt", expected: MESSAGE_CRC - 1, actual: MESSAGE_CRC },
    });
  });

  it("rejects a flipped bit in the data", () => {
    const bytes = testingChunk().toBytes();
    bytes[8 + 5] ^= 0x01;

    expect(captureError(() => Chunk.fromBytes(bytes))).toMatchObject({
      code: "checksum_mismatch",
    });
  });

  it("rejects a flipped bit in the type code", () => {
    const bytes = testingChunk().toBytes();
    // R -> r keeps the byte a letter, so only the crc can catch it.
    bytes[4] ^= 0x20;

    expect(captureError(() => Chunk.fromBytes(bytes))).toMatchObject({
      code: "checksum_mismatch",
    });
  });

  it("rejects a declared length that disagrees with the slice", () => {
    const error = captureError(() =>
      Chunk.fromBytes(rawChunk(41, "RuSt", Buffer.from(MESSAGE), MESSAGE_CRC))
    );

    expect(error).toMatchObject({
      code: "malformed_chunk",
      message: "Chunk contains incorrect length information",
      context: { declaredLength: 41, byteLength: 54 },
    });
  });

  it("rejects a slice too short to hold a length", () => {
    expect(captureError(() => Chunk.fromBytes(Buffer.from([0, 0])))).toMatchObject({
      code: "malformed_chunk",
    });
  });

  it("rejects a type code with non-letter bytes", () => {
    expect(
      captureError(() => Chunk.fromBytes(rawChunk(2, "Ru1t", Buffer.from("hi"), 0)))
    ).toMatchObject({ code: "invalid_type_code" });
  });

  it("serializes to the wire layout", () => {
    const expected = rawChunk(42, "RuSt", Buffer.from(MESSAGE), MESSAGE_CRC);

    expect(testingChunk().toBytes()).toEqual(expected);
    expect(testingChunk().byteLength()).toBe(54);
  });

  it("round-trips through bytes", () => {
    const chunk = new Chunk(ChunkType.fromString("ruSt"), Buffer.from([0, 1, 2, 255]));

    expect(Chunk.fromBytes(chunk.toBytes()).equals(chunk)).toBe(true);
  });

  it("handles empty data", () => {
    const chunk = new Chunk(ChunkType.fromString("IEND"), Buffer.alloc(0));

    expect(chunk.length).toBe(0);
    expect(chunk.crc).toBe(0xae426082);
    expect(chunk.toBytes()).toEqual(
      Buffer.from([0, 0, 0, 0, 0x49, 0x45, 0x4e, 0x44, 0xae, 0x42, 0x60, 0x82])
    );
    expect(chunk.dataAsString()).toBe("");
  });

  it("fails to render data that is not UTF-8", () => {
    const chunk = new Chunk(ChunkType.fromString("ruSt"), Buffer.from([0xff, 0xfe]));
    const error = captureError(() => chunk.dataAsString());

    expect(error).toMatchObject({ code: "text_decode", context: { chunkType: "ruSt" } });
    expect(error).toBeInstanceOf(PngError);
    if (error instanceof PngError) {
      expect(error.cause).toBeInstanceOf(TypeError);
    }
  });

  it("keeps a leading byte order mark in the text", () => {
    const chunk = new Chunk(ChunkType.fromString("ruSt"), Buffer.from([0xef, 0xbb, 0xbf, 0x68, 0x69]));

    expect(chunk.dataAsString()).toBe("\ufeffhi");
    expect(Buffer.from(chunk.dataAsString(), "utf8")).toEqual(chunk.getData());
  });

  it("does not share data with callers", () => {
    const source = Buffer.from("abc");
    const chunk = new Chunk(ChunkType.fromString("ruSt"), source);
    source[0] = 0x7a;
    chunk.getData()[1] = 0x7a;

    expect(chunk.dataAsString()).toBe("abc");
  });

  it("describes itself", () => {
    const chunk = new Chunk(ChunkType.fromString("ruSt"), Buffer.from([1, 2]));

    expect(chunk.toString()).toBe(
      ["Chunk {", "  length: 2, chunk_type: ruSt", "  data: [1, 2]", "  crc: 3142537851", "}"].join(
        "\n"
      )
    );
  });
});
