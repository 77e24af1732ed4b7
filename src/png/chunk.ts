import { ChunkType } from "./chunkType.js";
import { CRC32 } from "./crc32.js";
import { PngError, toPngError } from "./errors.js";
import { CHUNK_FIELD_SIZE, CHUNK_OVERHEAD, readField } from "./format.js";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export class Chunk {
  readonly crc: number;
  private readonly data: Buffer;

  constructor(readonly chunkType: ChunkType, data: Uint8Array) {
    this.data = Buffer.from(data);
    this.crc = CRC32.calculate(chunkType.bytes(), this.data);
  }

  static fromStrings(chunkType: string, message: string): Chunk {
    return new Chunk(ChunkType.fromString(chunkType), Buffer.from(message, "utf8"));
  }

  static fromBytes(bytes: Buffer): Chunk {
    if (bytes.length < CHUNK_FIELD_SIZE) {
      throw new PngError(
        "malformed_chunk",
        "Chunk too short to contain length information",
        { context: { byteLength: bytes.length } }
      );
    }

    const length = readField(bytes, 0).readUInt32BE(0);
    if (bytes.length !== length + CHUNK_OVERHEAD) {
      throw new PngError(
        "malformed_chunk",
        "Chunk contains incorrect length information",
        { context: { declaredLength: length, byteLength: bytes.length } }
      );
    }

    const chunkType = ChunkType.fromBytes(readField(bytes, CHUNK_FIELD_SIZE));
    const dataStart = 2 * CHUNK_FIELD_SIZE;
    const data = bytes.subarray(dataStart, dataStart + length);
    const crc = readField(bytes, dataStart + length).readUInt32BE(0);

    const chunk = new Chunk(chunkType, data);
    if (chunk.crc !== crc) {
      throw new PngError(
        "checksum_mismatch",
        `CRC checksum mismatch for chunk ${chunkType}`,
        { context: { chunkType: chunkType.toString(), expected: crc, actual: chunk.crc } }
      );
    }
    return chunk;
  }

  get length(): number {
    return this.data.length;
  }

  getData(): Buffer {
    return Buffer.from(this.data);
  }

  /** Total size on the wire: data plus length, type and crc fields. */
  byteLength(): number {
    return this.data.length + CHUNK_OVERHEAD;
  }

  dataAsString(): string {
    try {
      return utf8Decoder.decode(this.data);
    } catch (error) {
      throw toPngError(error, "text_decode", { chunkType: this.chunkType.toString() });
    }
  }

  toBytes(): Buffer {
    const buffer = Buffer.allocUnsafe(this.byteLength());
    buffer.writeUInt32BE(this.data.length, 0);
    this.chunkType.bytes().copy(buffer, CHUNK_FIELD_SIZE);
    this.data.copy(buffer, 2 * CHUNK_FIELD_SIZE);
    buffer.writeUInt32BE(this.crc, 2 * CHUNK_FIELD_SIZE + this.data.length);
    return buffer;
  }

  equals(other: Chunk): boolean {
    return (
      this.chunkType.equals(other.chunkType) &&
      this.crc === other.crc &&
      this.data.equals(other.data)
    );
  }

  toString(): string {
    return [
      "Chunk {",
      `  length: ${this.length}, chunk_type: ${this.chunkType}`,
      `  data: [${Array.from(this.data).join(", ")}]`,
      `  crc: ${this.crc}`,
      "}",
    ].join("\n");
  }
}
