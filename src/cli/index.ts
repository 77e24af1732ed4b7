#!/usr/bin/env node
import { decode, encode, encodeBatch, formatChunkListing, printChunks, remove } from "./commands.js";
import { isPngError } from "../png/errors.js";
import { parseCliArgs } from "./args.js";

const USAGE = [
  "Usage:",
  "  png-stash encode <file.png> <type> [--] <message> [output.png]",
  "  png-stash decode <file.png> <type>",
  "  png-stash remove <file.png> <type>",
  "  png-stash print <file.png> [--verbose]",
  "  png-stash encode-batch <file.png> <manifest.json> [--output <output.png>]",
].join("\n");

const { command, positional: positionalArgs, output: outputFlag, verbose } = parseCliArgs(
  process.argv.slice(2)
);

const abortController = new AbortController();

process.on("SIGINT", () => {
  if (!abortController.signal.aborted) {
    console.error("Aborting: received SIGINT.");
    abortController.abort();
  }
});

function usageError(): never {
  console.error(USAGE);
  process.exit(1);
}

const run = async (): Promise<void> => {
  const { signal } = abortController;
  const [filePath, second, third, fourth] = positionalArgs;

  try {
    switch (command) {
      case "encode": {
        if (!filePath || !second || third === undefined) usageError();
        const result = await encode(
          { filePath, chunkType: second, message: third, outputFile: fourth ?? outputFlag },
          signal
        );
        console.log(
          `Encoded ${result.chunk.length} bytes as chunk ${result.chunk.chunkType} into ${result.outputFile}`
        );
        break;
      }
      case "decode": {
        if (!filePath || !second) usageError();
        const message = await decode({ filePath, chunkType: second }, signal);
        console.log(`msg: ${message}`);
        break;
      }
      case "remove": {
        if (!filePath || !second) usageError();
        const removed = await remove({ filePath, chunkType: second }, signal);
        console.log(`Removed chunk ${removed.chunkType} (${removed.length} bytes) from ${filePath}`);
        break;
      }
      case "print": {
        if (!filePath) usageError();
        const listing = await printChunks({ filePath }, signal);
        for (const line of formatChunkListing(listing)) {
          console.log(line);
        }
        if (verbose) {
          for (const chunk of listing.chunks) {
            console.log(`  ${chunk.chunkType}: crc ${chunk.crc.toString(16).padStart(8, "0")}`);
          }
        }
        break;
      }
      case "encode-batch": {
        if (!filePath || !second) usageError();
        const result = await encodeBatch(
          { filePath, manifestPath: second, outputFile: third ?? outputFlag },
          signal
        );
        console.log(`Encoded ${result.chunks.length} chunks into ${result.outputFile}`);
        for (const chunk of result.chunks) {
          console.log(`  ${chunk.chunkType}: ${chunk.length} bytes`);
        }
        break;
      }
      default:
        usageError();
    }
  } catch (error) {
    if (isPngError(error)) {
      console.error(`${error.code}: ${error.message}`);
    } else {
      const message = error instanceof Error ? error.message : String(error);
      console.error(message);
    }
    process.exitCode = 1;
  }
};

void run();
