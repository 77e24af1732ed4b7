import { readPngFile, writePngFile } from "../io/pngFile.js";
import { createReadStream } from "../io/streams.js";
import type { ManifestEntry, ManifestSink } from "../parser/manifestParser.js";
import { parseManifestStream } from "../parser/manifestParser.js";
import { Chunk } from "../png/chunk.js";
import { PngError } from "../png/errors.js";
import type { Png } from "../png/png.js";

export type EncodeArgs = {
  filePath: string;
  chunkType: string;
  message: string;
  outputFile?: string;
};

export type DecodeArgs = {
  filePath: string;
  chunkType: string;
};

export type RemoveArgs = DecodeArgs;

export type PrintArgs = {
  filePath: string;
};

export type EncodeBatchArgs = {
  filePath: string;
  manifestPath: string;
  outputFile?: string;
};

export type ChunkSummary = {
  chunkType: string;
  length: number;
  crc: number;
};

export type ChunkListing = {
  filePath: string;
  size: number;
  chunks: ChunkSummary[];
};

const summarize = (chunk: Chunk): ChunkSummary => ({
  chunkType: chunk.chunkType.toString(),
  length: chunk.length,
  crc: chunk.crc,
});

export const encode = async (
  args: EncodeArgs,
  signal?: AbortSignal
): Promise<{ chunk: ChunkSummary; outputFile: string }> => {
  const png = await readPngFile(args.filePath, signal);
  const chunk = Chunk.fromStrings(args.chunkType, args.message);
  png.appendChunk(chunk);

  const outputFile = args.outputFile ?? args.filePath;
  await writePngFile(outputFile, png, signal);
  return { chunk: summarize(chunk), outputFile };
};

export const decode = async (args: DecodeArgs, signal?: AbortSignal): Promise<string> => {
  const png = await readPngFile(args.filePath, signal);
  const chunk = png.chunkByType(args.chunkType);
  if (!chunk) {
    throw new PngError(
      "chunk_not_found",
      `This file does not contain a message of chunk type ${args.chunkType}`,
      { context: { chunkType: args.chunkType, path: args.filePath } }
    );
  }
  return chunk.dataAsString();
};

export const remove = async (args: RemoveArgs, signal?: AbortSignal): Promise<ChunkSummary> => {
  const png = await readPngFile(args.filePath, signal);
  const removed = png.removeFirstChunk(args.chunkType);
  await writePngFile(args.filePath, png, signal);
  return summarize(removed);
};

export const listChunks = (filePath: string, png: Png): ChunkListing => ({
  filePath,
  size: png.byteLength(),
  chunks: png.chunks().map(summarize),
});

export const printChunks = async (
  args: PrintArgs,
  signal?: AbortSignal
): Promise<ChunkListing> => listChunks(args.filePath, await readPngFile(args.filePath, signal));

export const formatChunkListing = (listing: ChunkListing): string[] => [
  `File: ${listing.filePath}, Size: ${listing.size}`,
  ...listing.chunks.map(
    (chunk, index) =>
      `  chunk#${index}{ chunk_type: ${chunk.chunkType}, data_length: ${chunk.length}}`
  ),
];

class ChunkCollector implements ManifestSink {
  readonly chunks: Chunk[] = [];

  addEntry(entry: ManifestEntry): void {
    this.chunks.push(Chunk.fromStrings(entry.type, entry.message));
  }
}

export const encodeBatch = async (
  args: EncodeBatchArgs,
  signal?: AbortSignal
): Promise<{ chunks: ChunkSummary[]; outputFile: string }> => {
  const png = await readPngFile(args.filePath, signal);
  const collector = new ChunkCollector();
  await parseManifestStream(createReadStream(args.manifestPath, signal), collector);

  for (const chunk of collector.chunks) {
    png.appendChunk(chunk);
  }

  const outputFile = args.outputFile ?? args.filePath;
  await writePngFile(outputFile, png, signal);
  return { chunks: collector.chunks.map(summarize), outputFile };
};
