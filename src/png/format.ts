/**
 * PNG chunk container format
 *
 * Layout (all integers are big-endian):
 *
 * [File]
 *   - signature: 8 bytes (89 50 4E 47 0D 0A 1A 0A)
 *   - chunks, back to back with no padding, until the buffer ends
 *
 * [Chunk]
 *   - length: u32 (byte length of data only)
 *   - type: 4 bytes (ASCII letters, case-significant)
 *   - data: `length` bytes
 *   - crc: u32 (CRC-32 of type + data, length excluded)
 */

const SIGNATURE_BYTES = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] as const;

export const SIGNATURE_LENGTH = SIGNATURE_BYTES.length;

/** A fresh copy of the 8-byte PNG signature. */
export const pngSignature = (): Buffer => Buffer.from(SIGNATURE_BYTES);

export const hasPngSignature = (buffer: Uint8Array): boolean =>
  buffer.length >= SIGNATURE_LENGTH &&
  SIGNATURE_BYTES.every((byte, index) => buffer[index] === byte);

/** Width of the length, type and crc fields. */
export const CHUNK_FIELD_SIZE = 4;

/** Bytes a chunk occupies on top of its data (length + type + crc). */
export const CHUNK_OVERHEAD = 3 * CHUNK_FIELD_SIZE;

// Caller has already bounds-checked; a short slice here is a bug.
export const readField = (buffer: Buffer, offset: number): Buffer => {
  const field = buffer.subarray(offset, offset + CHUNK_FIELD_SIZE);
  if (field.length !== CHUNK_FIELD_SIZE) {
    throw new Error(`Invalid field length: ${field.length}`);
  }
  return field;
};
