import { createHash } from 'crypto';

/**
 * Content-addressed key: the first 128 bits of a SHA-256 digest over the JSON
 * encoding of the key fields. Identical inputs always map to the same id, so a
 * put with this key is an idempotent upsert. Not a random identifier.
 */
export function contentHashId(...parts: string[]): string {
  return createHash('sha256').update(JSON.stringify(parts)).digest('hex').slice(0, 32);
}

export function threatEventId(ipAddress: string, timestamp: string): string {
  return contentHashId(ipAddress, timestamp);
}

export function correlationId(cyberEventId: string, physicalEventId: string): string {
  return contentHashId(cyberEventId, physicalEventId);
}

export function feedId(source: string): string {
  return contentHashId(source);
}
