import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { InvalidInputError } from '../../shared/errors';
import { parseTimestamp } from '../../shared/utils/date-utils';

export type FeedFormat = 'json' | 'csv';

/** Any parseable timestamp, normalized to ISO 8601 UTC */
export const timestampString = z
  .string()
  .trim()
  .refine((value) => parseTimestamp(value) !== null, { message: 'Invalid timestamp' })
  .transform((value) => new Date(value).toISOString());

const score = z.number().min(0).max(1);

/**
 * One record as delivered by a threat feed (snake_case, like the feed exports)
 */
export const FeedRecordSchema = z
  .object({
    ip: z.string().trim().ip(),
    timestamp: timestampString,
    threat_type: z.string().trim().min(1).optional(),
    severity_score: score.optional(),
    confidence_score: score.optional(),
    country_code: z.string().trim().length(2).toUpperCase().optional(),
    latitude: z.number().min(-90).max(90).optional(),
    longitude: z.number().min(-180).max(180).optional(),
    city: z.string().optional(),
    region: z.string().optional(),
    isp: z.string().optional(),
    asn: z.union([z.string(), z.number()]).transform(String).optional(),
    first_seen: timestampString.optional(),
    last_seen: timestampString.optional(),
    report_count: z.number().int().min(0).optional(),
    categories: z.array(z.string()).optional(),
  })
  .passthrough();

export type FeedRecord = z.infer<typeof FeedRecordSchema>;

export type FeedRecordValidation =
  | { success: true; record: FeedRecord; raw: Record<string, unknown> }
  | { success: false; reason: string };

/**
 * `record` is the normalized view; `raw` is the object as the feed delivered it
 */
export function validateFeedRecord(raw: unknown): FeedRecordValidation {
  const parsed = FeedRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, reason: fromZodError(parsed.error).message };
  }
  if (!isPlainObject(raw)) {
    return { success: false, reason: 'Feed record must be an object' };
  }
  return { success: true, record: parsed.data, raw };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const NUMERIC_COLUMNS = new Set([
  'severity_score',
  'confidence_score',
  'latitude',
  'longitude',
  'report_count',
]);

/**
 * Parse a feed file body into raw records. Records are validated later, one at
 * a time, so a single bad row does not reject the file.
 */
export function parseFeedFile(body: string, format: FeedFormat): unknown[] {
  return format === 'csv' ? parseCsvFeed(body) : parseJsonFeed(body);
}

export function detectFeedFormat(key: string): FeedFormat | null {
  const lower = key.toLowerCase();
  if (lower.endsWith('.json')) return 'json';
  if (lower.endsWith('.csv')) return 'csv';
  return null;
}

function parseJsonFeed(body: string): unknown[] {
  let document: unknown;
  try {
    document = JSON.parse(body);
  } catch {
    throw new InvalidInputError('Feed file is not valid JSON');
  }

  if (Array.isArray(document)) {
    return document;
  }

  const wrapped = z.object({ records: z.array(z.unknown()) }).safeParse(document);
  if (wrapped.success) {
    return wrapped.data.records;
  }

  throw new InvalidInputError('Feed JSON must be an array or an object with a "records" array');
}

function parseCsvFeed(body: string): Record<string, unknown>[] {
  let rows: Record<string, string>[];
  try {
    rows = parse(body, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true, // Handle UTF-8 BOM
    });
  } catch (error) {
    throw new InvalidInputError(
      `Feed CSV could not be parsed: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return rows.map((row) => {
    const record: Record<string, unknown> = {};

    for (const [column, cell] of Object.entries(row)) {
      // Empty cells mean "not provided"
      if (cell === '') {
        continue;
      }

      if (column === 'categories') {
        record[column] = cell
          .split(';')
          .map((tag) => tag.trim())
          .filter((tag) => tag.length > 0);
      } else if (NUMERIC_COLUMNS.has(column)) {
        const value = Number(cell);
        // Leave unparseable numbers as text so validation names the column
        record[column] = Number.isNaN(value) ? cell : value;
      } else {
        record[column] = cell;
      }
    }

    return record;
  });
}

/**
 * Feed drops land at <incomingPrefix><source>/<file>.(json|csv). Returns null
 * for keys outside that layout.
 */
export function parseFeedObjectKey(
  key: string,
  incomingPrefix: string
): { source: string; format: FeedFormat } | null {
  if (!key.startsWith(incomingPrefix)) {
    return null;
  }

  const parts = key.slice(incomingPrefix.length).split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return null;
  }

  const format = detectFeedFormat(parts[1]);
  return format ? { source: parts[0], format } : null;
}
