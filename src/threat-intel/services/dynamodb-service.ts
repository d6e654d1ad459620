import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  ScanCommand,
  type GetCommandOutput,
  type ScanCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import type {
  Correlation,
  EnrichmentRecord,
  PhysicalEvidenceEvent,
  ThreatEvent,
  ThreatFeed,
} from '../../shared/types';
import { StorageError, describeError } from '../../shared/errors';
import { isOnOrAfter, subtractDays } from '../../shared/utils/date-utils';
import { timestampString } from './feed-parser';
import type {
  CorrelationRepository,
  EnrichmentCacheRepository,
  EvidenceRepository,
  ThreatEventRepository,
  ThreatFeedRepository,
} from './repositories';

export type DocumentClient = Pick<DynamoDBDocumentClient, 'send'>;

type StoredItem = NonNullable<GetCommandOutput['Item']>;

// A stored timestamp with a UTC offset sorts up to 14 hours away from its
// instant, so scans use a wider text bound and the exact cut is made after parsing
const SCAN_MARGIN_DAYS = 1;

const StoredLocationSchema = z.object({
  latitude: z.number().min(-90).max(90).optional(),
  longitude: z.number().min(-180).max(180).optional(),
  city: z.string().optional(),
  region: z.string().optional(),
  country: z.string().optional(),
  countryCode: z.string().optional(),
  isp: z.string().optional(),
  asn: z.union([z.string(), z.number()]).transform(String).optional(),
});

/**
 * Evidence rows are written by other systems, so they are checked on read
 */
const StoredEvidenceSchema = z.object({
  evidenceId: z.string().min(1),
  kind: z.string().min(1),
  location: StoredLocationSchema.optional(),
  timestamp: timestampString,
  metadata: z.record(z.unknown()).default({}),
});

export function createDocumentClient(): DynamoDBDocumentClient {
  const client = new DynamoDBClient({});
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: { removeUndefinedValues: true },
  });
}

/**
 * Shared Put/Get/Scan plumbing for one table. Every failure surfaces as StorageError.
 */
class DynamoDBTable {
  constructor(
    private docClient: DocumentClient,
    readonly tableName: string,
    private keyName: string
  ) {}

  async put(item: object): Promise<void> {
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: { ...item },
        })
      );
    } catch (error) {
      throw new StorageError(`Failed to write to ${this.tableName}: ${describeError(error)}`, error);
    }
  }

  async get(key: string): Promise<StoredItem | null> {
    try {
      const result = await this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { [this.keyName]: key },
        })
      );
      return result.Item ?? null;
    } catch (error) {
      throw new StorageError(`Failed to read from ${this.tableName}: ${describeError(error)}`, error);
    }
  }

  /**
   * Scan with a filter, following LastEvaluatedKey until the table is exhausted
   */
  async scan(
    filterExpression: string,
    names: Record<string, string>,
    values: Record<string, unknown>
  ): Promise<StoredItem[]> {
    const items: StoredItem[] = [];
    let exclusiveStartKey: ScanCommandInput['ExclusiveStartKey'];

    try {
      do {
        const page = await this.docClient.send(
          new ScanCommand({
            TableName: this.tableName,
            FilterExpression: filterExpression,
            ExpressionAttributeNames: names,
            ExpressionAttributeValues: values,
            ExclusiveStartKey: exclusiveStartKey,
          })
        );
        items.push(...(page.Items ?? []));
        exclusiveStartKey = page.LastEvaluatedKey;
      } while (exclusiveStartKey);
    } catch (error) {
      throw new StorageError(`Failed to scan ${this.tableName}: ${describeError(error)}`, error);
    }

    return items;
  }
}

export class DynamoDBThreatEventRepository implements ThreatEventRepository {
  private table: DynamoDBTable;

  constructor(docClient: DocumentClient, tableName: string) {
    this.table = new DynamoDBTable(docClient, tableName, 'eventId');
  }

  async upsert(event: ThreatEvent): Promise<void> {
    await this.table.put(event);
  }

  async listSince(since: Date, countryCode?: string): Promise<ThreatEvent[]> {
    const names: Record<string, string> = { '#ts': 'timestamp' };
    const values: Record<string, unknown> = {
      ':since': subtractDays(since, SCAN_MARGIN_DAYS).toISOString(),
    };
    let filter = '#ts >= :since';

    if (countryCode) {
      names['#location'] = 'location';
      names['#countryCode'] = 'countryCode';
      values[':countryCode'] = countryCode;
      filter += ' AND #location.#countryCode = :countryCode';
    }

    const items = await this.table.scan(filter, names, values);
    return items
      .map((item) => item as ThreatEvent)
      .filter((event) => isOnOrAfter(event.timestamp, since));
  }
}

export class DynamoDBEnrichmentCacheRepository implements EnrichmentCacheRepository {
  private table: DynamoDBTable;

  constructor(docClient: DocumentClient, tableName: string) {
    this.table = new DynamoDBTable(docClient, tableName, 'ipAddress');
  }

  async get(ipAddress: string): Promise<EnrichmentRecord | null> {
    const item = await this.table.get(ipAddress);
    return item ? (item as EnrichmentRecord) : null;
  }

  async put(record: EnrichmentRecord): Promise<void> {
    await this.table.put(record);
  }
}

export class DynamoDBCorrelationRepository implements CorrelationRepository {
  private table: DynamoDBTable;

  constructor(docClient: DocumentClient, tableName: string) {
    this.table = new DynamoDBTable(docClient, tableName, 'correlationId');
  }

  async upsert(correlation: Correlation): Promise<void> {
    await this.table.put(correlation);
  }

  async listSince(since: Date): Promise<Correlation[]> {
    const items = await this.table.scan(
      '#createdAt >= :since',
      { '#createdAt': 'createdAt' },
      { ':since': subtractDays(since, SCAN_MARGIN_DAYS).toISOString() }
    );
    return items
      .map((item) => item as Correlation)
      .filter((correlation) => isOnOrAfter(correlation.createdAt, since));
  }
}

export class DynamoDBEvidenceRepository implements EvidenceRepository {
  private table: DynamoDBTable;

  constructor(docClient: DocumentClient, tableName: string) {
    this.table = new DynamoDBTable(docClient, tableName, 'evidenceId');
  }

  async listSince(since: Date): Promise<PhysicalEvidenceEvent[]> {
    const items = await this.table.scan(
      '#ts >= :since',
      { '#ts': 'timestamp' },
      { ':since': subtractDays(since, SCAN_MARGIN_DAYS).toISOString() }
    );

    const evidence: PhysicalEvidenceEvent[] = [];
    for (const item of items) {
      const parsed = StoredEvidenceSchema.safeParse(item);
      if (!parsed.success) {
        console.warn(
          `Skipping evidence row ${String(item.evidenceId)} in ${this.table.tableName}: ${fromZodError(parsed.error).message}`
        );
        continue;
      }
      if (isOnOrAfter(parsed.data.timestamp, since)) {
        evidence.push(parsed.data);
      }
    }
    return evidence;
  }
}

export class DynamoDBThreatFeedRepository implements ThreatFeedRepository {
  private table: DynamoDBTable;

  constructor(docClient: DocumentClient, tableName: string) {
    this.table = new DynamoDBTable(docClient, tableName, 'feedId');
  }

  async upsert(feed: ThreatFeed): Promise<void> {
    await this.table.put(feed);
  }
}
