import { InvalidArgumentError } from "./errors";
import { type ChunkMetadata, isChunkMetadata } from "./metadata";
import type { EmbeddingInput } from "./quantizer";
import type { DocumentChunk } from "./store";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number");
}

/**
 * Accepts `[0.1, -0.2, ...]` or `[[...], [...]]`.
 */
export function parseEmbedding(value: unknown, where: string): EmbeddingInput {
  if (isNumberArray(value)) return value;
  if (Array.isArray(value) && value.every(isNumberArray)) return value;
  throw new InvalidArgumentError(`${where}: embedding must be a number array or an array of number arrays`);
}

/**
 * One JSON Lines record:
 * `{"document_id", "chunk_number", "content", "metadata"?, "embedding"?}`
 */
export function parseChunkRecord(value: unknown, where: string): DocumentChunk {
  if (!isRecord(value)) {
    throw new InvalidArgumentError(`${where}: expected a JSON object`);
  }
  const { document_id, chunk_number, content, metadata, embedding } = value;
  if (typeof document_id !== "string" || document_id.length === 0) {
    throw new InvalidArgumentError(`${where}: document_id must be a non-empty string`);
  }
  if (typeof chunk_number !== "number" || !Number.isSafeInteger(chunk_number) || chunk_number < 0) {
    throw new InvalidArgumentError(`${where}: chunk_number must be a non-negative integer`);
  }
  if (typeof content !== "string") {
    throw new InvalidArgumentError(`${where}: content must be a string`);
  }
  let chunkMetadata: ChunkMetadata = {};
  if (metadata !== undefined && metadata !== null) {
    if (!isChunkMetadata(metadata)) {
      throw new InvalidArgumentError(`${where}: metadata must be an object of JSON values`);
    }
    chunkMetadata = metadata;
  }

  return {
    documentId: document_id,
    chunkNumber: chunk_number,
    content,
    metadata: chunkMetadata,
    embedding: embedding === undefined || embedding === null ? null : parseEmbedding(embedding, where),
  };
}

export function parseChunkLines(text: string, source = "input"): DocumentChunk[] {
  const chunks: DocumentChunk[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") return;
    const where = `${source}:${index + 1}`;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      throw new InvalidArgumentError(`${where}: invalid JSON`, { cause: err });
    }
    chunks.push(parseChunkRecord(parsed, where));
  });
  return chunks;
}

export function parseQueryEmbedding(text: string, source = "query"): EmbeddingInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new InvalidArgumentError(`${source}: invalid JSON`, { cause: err });
  }
  if (isRecord(parsed) && "embedding" in parsed) {
    return parseEmbedding(parsed.embedding, source);
  }
  return parseEmbedding(parsed, source);
}
