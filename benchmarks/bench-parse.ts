import { Buffer } from "node:buffer";
import { Chunk } from "../src/png/chunk.js";
import { ChunkType } from "../src/png/chunkType.js";
import { Png } from "../src/png/png.js";

const buildPng = (chunkCount: number, chunkSize: number): Buffer => {
  const data = Buffer.alloc(chunkSize);
  for (let i = 0; i < chunkSize; i++) {
    data[i] = i % 256;
  }
  const chunkType = ChunkType.fromString("IDAT");
  const chunks: Chunk[] = [];
  for (let i = 0; i < chunkCount; i++) {
    chunks.push(new Chunk(chunkType, data));
  }
  return Png.fromChunks(chunks).toBytes();
};

const runBenchmark = () => {
  const buffer = buildPng(160, 64 * 1024); // ~10MB
  const iterations = 20;

  console.log(`Running benchmark on ${(buffer.length / 1024 / 1024).toFixed(2)}MB...`);

  const startParse = performance.now();
  let png = Png.fromBytes(buffer);
  for (let i = 1; i < iterations; i++) {
    png = Png.fromBytes(buffer);
  }
  const parseTime = performance.now() - startParse;
  console.log(`Parse: ${(parseTime / iterations).toFixed(2)}ms per file`);

  const startSerialize = performance.now();
  let output = png.toBytes();
  for (let i = 1; i < iterations; i++) {
    output = png.toBytes();
  }
  const serializeTime = performance.now() - startSerialize;
  console.log(`Serialize: ${(serializeTime / iterations).toFixed(2)}ms per file`);

  if (!output.equals(buffer)) {
    console.error("Mismatch! Serialized output differs from input.");
    process.exit(1);
  } else {
    console.log("Verification passed: output is byte-identical to input.");
  }
};

runBenchmark();
