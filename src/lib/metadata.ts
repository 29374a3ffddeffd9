export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type ChunkMetadata = { [key: string]: MetadataValue };

const FORMAT_VERSION = 1;

interface MetadataEnvelope {
  v: typeof FORMAT_VERSION;
  data: ChunkMetadata;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMetadataValue(value: unknown, depth = 0): value is MetadataValue {
  if (depth > 64) return false;
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every((item) => isMetadataValue(item, depth + 1));
      }
      return Object.values(value).every((item) => isMetadataValue(item, depth + 1));
    default:
      return false;
  }
}

export function isChunkMetadata(value: unknown): value is ChunkMetadata {
  return isRecord(value) && isMetadataValue(value);
}

/**
 * Serializes metadata into the versioned `{"v":1,"data":{...}}` envelope.
 */
export function encodeMetadata(metadata: ChunkMetadata): string {
  if (!isChunkMetadata(metadata)) {
    throw new TypeError("Metadata must be a plain object of JSON-compatible values");
  }
  const envelope: MetadataEnvelope = { v: FORMAT_VERSION, data: metadata };
  return JSON.stringify(envelope);
}

/**
 * Total decoder: anything that is not a valid envelope decodes to `{}`.
 */
export function decodeMetadata(encoded: string | null | undefined): ChunkMetadata {
  if (!encoded) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(encoded);
  } catch {
    return {};
  }
  if (!isRecord(parsed) || parsed.v !== FORMAT_VERSION) return {};
  return isChunkMetadata(parsed.data) ? parsed.data : {};
}
