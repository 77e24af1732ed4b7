import { createReadStream as fsCreateReadStream, createWriteStream as fsCreateWriteStream } from "node:fs";
import type { ReadStream, WriteStream } from "node:fs";
import { finished } from "node:stream/promises";

// PNG files are read whole; large reads keep the chunk count low.
const READ_HIGH_WATER_MARK = 64 * 1024;
const WRITE_HIGH_WATER_MARK = 16 * 1024;

// fs destroys the stream with an AbortError once `signal` fires.
export const createReadStream = (path: string, signal?: AbortSignal): ReadStream =>
  fsCreateReadStream(path, { highWaterMark: READ_HIGH_WATER_MARK, signal });

export const createWriteStream = (path: string, signal?: AbortSignal): WriteStream =>
  fsCreateWriteStream(path, { highWaterMark: WRITE_HIGH_WATER_MARK, signal });

export const readFileBytes = async (path: string, signal?: AbortSignal): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of createReadStream(path, signal)) {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    chunks.push(bytes);
    total += bytes.length;
  }
  return Buffer.concat(chunks, total);
};

export const writeFileBytes = async (
  path: string,
  bytes: Uint8Array,
  signal?: AbortSignal
): Promise<void> => {
  const stream = createWriteStream(path, signal);
  stream.end(bytes);
  await finished(stream);
};
