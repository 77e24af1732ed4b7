export { ChunkType } from "./png/chunkType.js";
export { Chunk } from "./png/chunk.js";
export { Png } from "./png/png.js";
export { CRC32 } from "./png/crc32.js";
export { PngError, isPngError, toPngError } from "./png/errors.js";
export type { PngErrorCode, PngErrorContext, PngErrorOptions } from "./png/errors.js";
export { CHUNK_FIELD_SIZE, CHUNK_OVERHEAD, SIGNATURE_LENGTH, hasPngSignature, pngSignature } from "./png/format.js";
export { readPngFile, writePngFile } from "./io/pngFile.js";
export { createManifestParser, parseManifestStream, toManifestEntry } from "./parser/manifestParser.js";
export type { ManifestEntry, ManifestSink } from "./parser/manifestParser.js";
export { decode, encode, encodeBatch, formatChunkListing, listChunks, printChunks, remove } from "./cli/commands.js";
export type {
  ChunkListing,
  ChunkSummary,
  DecodeArgs,
  EncodeArgs,
  EncodeBatchArgs,
  PrintArgs,
  RemoveArgs,
} from "./cli/commands.js";
