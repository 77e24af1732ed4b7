import { toPngError } from "../png/errors.js";
import { Png } from "../png/png.js";
import { readFileBytes, writeFileBytes } from "./streams.js";

export const readPngFile = async (path: string, signal?: AbortSignal): Promise<Png> => {
  let bytes: Buffer;
  try {
    bytes = await readFileBytes(path, signal);
  } catch (error) {
    throw toPngError(error, "io", { path });
  }
  return Png.fromBytes(bytes);
};

export const writePngFile = async (
  path: string,
  png: Png,
  signal?: AbortSignal
): Promise<void> => {
  try {
    await writeFileBytes(path, png.toBytes(), signal);
  } catch (error) {
    throw toPngError(error, "io", { path });
  }
};
