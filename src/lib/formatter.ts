import type { RetrievedChunk } from "./store";
import { formatChunkKey } from "./store";

export interface FormatOptions {
  isPlain: boolean;
  content: boolean;
}

const style = {
  bold: (s: string) => `\x1b[1m${s}\x1b[22m`,
  dim: (s: string) => `\x1b[2m${s}\x1b[22m`,
  green: (s: string) => `\x1b[32m${s}\x1b[39m`,
  blue: (s: string) => `\x1b[34m${s}\x1b[39m`,
};

const SNIPPET_LENGTH = 120;

export function snippet(content: string, max = SNIPPET_LENGTH): string {
  const flat = content.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

function formatOne(chunk: RetrievedChunk, rank: number, options: FormatOptions): string {
  const key = formatChunkKey(chunk);
  const score = chunk.score.toFixed(4);
  const body = options.content ? chunk.content : snippet(chunk.content);

  if (options.isPlain) {
    return `${rank}. ${key} (score ${score})\n${body}`;
  }
  return `${style.dim(`${rank}.`)} ${style.bold(style.blue(key))} ${style.green(score)}\n${body}`;
}

export function formatResults(results: RetrievedChunk[], options: FormatOptions): string {
  if (results.length === 0) {
    return options.isPlain ? "No results." : style.dim("No results.");
  }
  return results.map((chunk, i) => formatOne(chunk, i + 1, options)).join("\n\n");
}

/**
 * Results without ANSI, one JSON object per chunk.
 */
export function formatJson(results: RetrievedChunk[]): string {
  return JSON.stringify(
    results.map((chunk) => ({
      document_id: chunk.documentId,
      chunk_number: chunk.chunkNumber,
      score: chunk.score,
      content: chunk.content,
      metadata: chunk.metadata,
    })),
    null,
    2,
  );
}
