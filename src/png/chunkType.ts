import { CHUNK_FIELD_SIZE } from "./format.js";
import { PngError } from "./errors.js";

const TYPE_CODE_PATTERN = /^[A-Za-z]{4}$/;

// Bit 5 of an ASCII letter is clear for uppercase, set for lowercase.
const CASE_BIT = 0x20;

const isAsciiLetter = (byte: number): boolean =>
  (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a);

/**
 * A 4-byte chunk type code. The case of each letter carries one property
 * bit; the codes are compared as fixed binary values, never as text.
 */
export class ChunkType {
  private constructor(private readonly raw: Buffer) {}

  static fromBytes(bytes: Uint8Array): ChunkType {
    if (bytes.length !== CHUNK_FIELD_SIZE) {
      throw new PngError(
        "invalid_type_code",
        `Invalid chunk type length: ${bytes.length}`,
        { context: { length: bytes.length } }
      );
    }
    if (!bytes.every(isAsciiLetter)) {
      throw new PngError(
        "invalid_type_code",
        "Invalid chunk type: bytes must be ASCII letters",
        { context: { bytes: Array.from(bytes) } }
      );
    }
    return new ChunkType(Buffer.from(bytes));
  }

  static fromString(value: string): ChunkType {
    const byteLength = Buffer.byteLength(value, "utf8");
    if (byteLength !== CHUNK_FIELD_SIZE) {
      throw new PngError(
        "invalid_type_code",
        `Invalid chunk type length: ${byteLength}`,
        { context: { chunkType: value } }
      );
    }
    if (!TYPE_CODE_PATTERN.test(value)) {
      throw new PngError(
        "invalid_type_code",
        `Invalid chunk type "${value}": must be ASCII letters`,
        { context: { chunkType: value } }
      );
    }
    return new ChunkType(Buffer.from(value, "ascii"));
  }

  bytes(): Buffer {
    return Buffer.from(this.raw);
  }

  isCritical(): boolean {
    return this.isUppercaseAt(0);
  }

  isPublic(): boolean {
    return this.isUppercaseAt(1);
  }

  isReservedBitValid(): boolean {
    return this.isUppercaseAt(2);
  }

  isSafeToCopy(): boolean {
    return !this.isUppercaseAt(3);
  }

  /**
   * Private, reserved-bit-conformant codes only. Stricter than the PNG rule,
   * which accepts public codes too.
   */
  isValid(): boolean {
    return !this.isPublic() && this.isReservedBitValid();
  }

  equals(other: ChunkType): boolean {
    return this.raw.equals(other.raw);
  }

  toString(): string {
    return this.raw.toString("ascii");
  }

  private isUppercaseAt(index: number): boolean {
    return (this.raw[index] & CASE_BIT) === 0;
  }
}
