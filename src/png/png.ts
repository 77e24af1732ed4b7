import { Chunk } from "./chunk.js";
import { PngError } from "./errors.js";
import {
  CHUNK_FIELD_SIZE,
  CHUNK_OVERHEAD,
  SIGNATURE_LENGTH,
  hasPngSignature,
  pngSignature,
} from "./format.js";

export class Png {
  private readonly entries: Chunk[];

  private constructor(chunks: Chunk[]) {
    this.entries = chunks;
  }

  static fromChunks(chunks: readonly Chunk[]): Png {
    return new Png([...chunks]);
  }

  static fromBytes(buffer: Buffer): Png {
    if (!hasPngSignature(buffer)) {
      throw new PngError("bad_signature", "Invalid PNG signature", {
        context: { header: Array.from(buffer.subarray(0, SIGNATURE_LENGTH)) },
      });
    }

    const chunks: Chunk[] = [];
    let offset: number = SIGNATURE_LENGTH;
    while (offset < buffer.length) {
      if (offset + CHUNK_FIELD_SIZE > buffer.length) {
        throw new PngError("malformed_chunk", "Unexpected end of chunk length", {
          context: { offset },
        });
      }
      const length = buffer.readUInt32BE(offset);
      const end = offset + length + CHUNK_OVERHEAD;
      if (end > buffer.length) {
        throw new PngError("malformed_chunk", "Unexpected end of chunk data", {
          context: { offset, declaredLength: length, remaining: buffer.length - offset },
        });
      }
      chunks.push(Chunk.fromBytes(buffer.subarray(offset, end)));
      offset = end;
    }

    return new Png(chunks);
  }

  appendChunk(chunk: Chunk): void {
    this.entries.push(chunk);
  }

  removeFirstChunk(chunkType: string): Chunk {
    const index = this.entries.findIndex(
      (chunk) => chunk.chunkType.toString() === chunkType
    );
    if (index === -1) {
      throw new PngError("chunk_not_found", `Chunk type ${chunkType} not found`, {
        context: { chunkType },
      });
    }
    const [removed] = this.entries.splice(index, 1);
    return removed;
  }

  chunkByType(chunkType: string): Chunk | undefined {
    return this.entries.find((chunk) => chunk.chunkType.toString() === chunkType);
  }

  header(): Buffer {
    return pngSignature();
  }

  chunks(): Chunk[] {
    return [...this.entries];
  }

  byteLength(): number {
    return this.entries.reduce<number>(
      (total, chunk) => total + chunk.byteLength(),
      SIGNATURE_LENGTH
    );
  }

  toBytes(): Buffer {
    return Buffer.concat(
      [pngSignature(), ...this.entries.map((chunk) => chunk.toBytes())],
      this.byteLength()
    );
  }
}
