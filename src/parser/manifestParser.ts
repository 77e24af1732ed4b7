import { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Readable, Transform } from "node:stream";
import pkg from "stream-json";
import StreamArray from "stream-json/streamers/StreamArray.js";
import { PngError, toPngError } from "../png/errors.js";
const { parser } = pkg;
const { streamArray } = StreamArray;

/**
 * Manifest format: a JSON array of `{ "type": "ruSt", "message": "..." }`.
 */
export type ManifestEntry = {
  type: string;
  message: string;
};

export interface ManifestSink {
  addEntry(entry: ManifestEntry, index: number): void | Promise<void>;
}

type ArrayItem = {
  key: number;
  value: unknown;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const toManifestEntry = (value: unknown, index: number): ManifestEntry => {
  if (!isRecord(value)) {
    throw new PngError("invalid_manifest", `Manifest entry ${index} is not an object`, {
      context: { index },
    });
  }
  const { type, message } = value;
  if (typeof type !== "string" || typeof message !== "string") {
    throw new PngError(
      "invalid_manifest",
      `Manifest entry ${index} needs string "type" and "message" fields`,
      { context: { index } }
    );
  }
  return { type, message };
};

const createSinkWriter = (sink: ManifestSink): Writable =>
  new Writable({
    objectMode: true,
    write(item: ArrayItem, _encoding, callback) {
      try {
        const result = sink.addEntry(toManifestEntry(item.value, item.key), item.key);
        if (result instanceof Promise) {
          result.then(() => callback(), (err: Error) => callback(err));
        } else {
          callback();
        }
      } catch (error) {
        callback(toPngError(error, "invalid_manifest", { index: item.key }));
      }
    },
  });

export const createManifestParser = (
  sink: ManifestSink
): { parser: Transform; streamer: Transform; writer: Writable } => ({
  parser: parser(),
  streamer: streamArray(),
  writer: createSinkWriter(sink),
});

export const parseManifestStream = async (
  readable: Readable,
  sink: ManifestSink
): Promise<void> => {
  const { parser: parserStream, streamer, writer } = createManifestParser(sink);
  try {
    await pipeline(readable, parserStream, streamer, writer);
  } catch (error) {
    throw toPngError(error, "invalid_manifest");
  }
};
