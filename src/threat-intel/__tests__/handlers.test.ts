import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { S3Event } from 'aws-lambda';
import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { DynamoDBDocumentClient, PutCommand, ScanCommand } from '@aws-sdk/lib-dynamodb';
import { InvalidInputError } from '../../shared/errors';
import { makeEvidence, makeThreatEvent } from '../services/__tests__/fakes';
import { correlationHandler, enrichmentHandler, feedIngestionHandler } from '..';

const FEED_KEY = 'threat_intel/feeds/incoming/test-feed/batch.json';

function s3Event(...keys: string[]): S3Event {
  return {
    Records: keys.map((key) => ({
      eventVersion: '2.1',
      eventSource: 'aws:s3',
      awsRegion: 'af-south-1',
      eventTime: '2026-03-01T10:00:00.000Z',
      eventName: 'ObjectCreated:Put',
      userIdentity: { principalId: 'test' },
      requestParameters: { sourceIPAddress: '192.0.2.1' },
      responseElements: { 'x-amz-request-id': 'test', 'x-amz-id-2': 'test' },
      s3: {
        s3SchemaVersion: '1.0',
        configurationId: 'feed-drop',
        bucket: {
          name: 'test-bucket',
          ownerIdentity: { principalId: 'test' },
          arn: 'arn:aws:s3:::test-bucket',
        },
        object: { key, size: 128, eTag: 'test', sequencer: '0' },
      },
    })),
  };
}

/**
 * Routes S3 commands to in-memory objects and records every command sent
 */
function stubS3(objects: Record<string, string>) {
  const commands: unknown[] = [];
  vi.spyOn(S3Client.prototype, 'send').mockImplementation(async (command: unknown) => {
    commands.push(command);
    if (command instanceof GetObjectCommand) {
      const body = objects[command.input.Key ?? ''];
      if (body === undefined) {
        throw new Error('NoSuchKey');
      }
      return { Body: { transformToString: async () => body } };
    }
    return {};
  });
  return commands;
}

/**
 * Answers scans per table and records every put; puts for `failIp` are rejected
 */
function stubDynamoDB(tables: Record<string, unknown[]> = {}, failIp?: string) {
  const puts: Array<{ table: string; item: Record<string, unknown> }> = [];
  vi.spyOn(DynamoDBDocumentClient.prototype, 'send').mockImplementation(
    async (command: unknown) => {
      if (command instanceof PutCommand) {
        const item: Record<string, unknown> = command.input.Item ?? {};
        if (failIp && item.ipAddress === failIp) {
          throw new Error('ProvisionedThroughputExceededException');
        }
        puts.push({ table: command.input.TableName ?? '', item });
        return {};
      }
      if (command instanceof ScanCommand) {
        return { Items: tables[command.input.TableName ?? ''] ?? [] };
      }
      return {};
    }
  );
  return puts;
}

describe('Lambda handlers', () => {
  beforeEach(() => {
    vi.stubEnv('AWS_REGION', 'af-south-1');
    vi.stubEnv('BUCKET_NAME', 'test-bucket');
    vi.stubEnv('THREAT_EVENTS_TABLE', 'threat_events');
    vi.stubEnv('ENRICHMENT_CACHE_TABLE', 'ip_enrichment_cache');
    vi.stubEnv('CORRELATIONS_TABLE', 'cyber_physical_correlations');
    vi.stubEnv('EVIDENCE_TABLE', 'evidence');
    vi.stubEnv('THREAT_FEEDS_TABLE', 'threat_feeds');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('ingests a dropped feed file and moves it to processed', async () => {
    const s3Commands = stubS3({
      [FEED_KEY]: JSON.stringify([
        { ip: '198.51.100.7', timestamp: '2026-03-01T10:00:00Z', threat_type: 'phishing' },
        { ip: '203.0.113.9', timestamp: '2026-03-01T11:00:00Z', threat_type: 'botnet' },
      ]),
    });
    const puts = stubDynamoDB();

    const results = await feedIngestionHandler(s3Event(FEED_KEY));

    expect(results).toEqual([
      { source: 'test-feed', received: 2, ingested: 2, rejected: [], failed: [] },
    ]);
    expect(puts.map((put) => put.table)).toEqual(['threat_events', 'threat_events', 'threat_feeds']);
    expect(s3Commands).toEqual([
      expect.any(GetObjectCommand),
      expect.any(CopyObjectCommand),
      expect.any(DeleteObjectCommand),
    ]);

    const [, copy, remove] = s3Commands;
    expect(copy).toBeInstanceOf(CopyObjectCommand);
    if (copy instanceof CopyObjectCommand) {
      expect(copy.input.CopySource).toBe(`test-bucket/${FEED_KEY}`);
      expect(copy.input.Key).toMatch(
        /^threat_intel\/feeds\/processed\/test-feed\/\d{4}-\d{2}-\d{2}\/batch\.json$/
      );
    }
    expect(remove).toBeInstanceOf(DeleteObjectCommand);
    if (remove instanceof DeleteObjectCommand) {
      expect(remove.input).toEqual({ Bucket: 'test-bucket', Key: FEED_KEY });
    }
  });

  it('leaves the feed file in place when a record cannot be stored', async () => {
    const s3Commands = stubS3({
      [FEED_KEY]: JSON.stringify([
        { ip: '198.51.100.7', timestamp: '2026-03-01T10:00:00Z' },
        { ip: '203.0.113.9', timestamp: '2026-03-01T11:00:00Z' },
      ]),
    });
    const puts = stubDynamoDB({}, '203.0.113.9');

    await expect(feedIngestionHandler(s3Event(FEED_KEY))).rejects.toThrow(
      `Failed to ingest 1 feed file(s): ${FEED_KEY}`
    );

    // Both records were attempted; only the first write landed
    expect(puts.filter((put) => put.table === 'threat_events').map((put) => put.item.ipAddress)).toEqual([
      '198.51.100.7',
    ]);
    expect(s3Commands).toEqual([expect.any(GetObjectCommand)]);
  });

  it('processes every feed file before reporting the ones that failed', async () => {
    const missingKey = 'threat_intel/feeds/incoming/test-feed/missing.json';
    const s3Commands = stubS3({
      [FEED_KEY]: JSON.stringify([{ ip: '198.51.100.7', timestamp: '2026-03-01T10:00:00Z' }]),
    });
    stubDynamoDB();

    await expect(feedIngestionHandler(s3Event(missingKey, FEED_KEY))).rejects.toThrow(
      `Failed to ingest 1 feed file(s): ${missingKey}`
    );

    expect(s3Commands).toEqual([
      expect.any(GetObjectCommand),
      expect.any(GetObjectCommand),
      expect.any(CopyObjectCommand),
      expect.any(DeleteObjectCommand),
    ]);
  });

  it('runs a correlation pass and returns where the report was written', async () => {
    const recent = new Date(Date.now() - 60 * 60 * 1000).toISOString();
    const location = { latitude: -26.2, longitude: 28.04, countryCode: 'ZA' };
    const s3Commands = stubS3({});
    const puts = stubDynamoDB({
      threat_events: [makeThreatEvent({ eventId: 'za-phishing', timestamp: recent, location })],
      evidence: [
        makeEvidence({ evidenceId: 'fraud-report', timestamp: recent, location }),
        { evidenceId: 'no-kind', timestamp: recent, location, metadata: {} },
      ],
    });

    const result = await correlationHandler({});

    expect(result.correlationCount).toBe(1);
    expect(result.reportLocation).toMatch(
      new RegExp(
        `^s3://test-bucket/threat_intel/reports/\\d{4}-\\d{2}-\\d{2}/threat-intelligence-report-${result.reportId}\\.json$`
      )
    );
    expect(puts).toEqual([
      {
        table: 'cyber_physical_correlations',
        item: expect.objectContaining({
          cyberEventId: 'za-phishing',
          physicalEventId: 'fraud-report',
          correlationType: 'phishing_fraud_correlation',
        }),
      },
    ]);
    expect(s3Commands).toEqual([expect.any(PutObjectCommand)]);
  });

  it('skips objects outside the incoming feed layout', async () => {
    await expect(
      feedIngestionHandler(s3Event('threat_intel/reports/2026-03-01/report.json'))
    ).resolves.toEqual([]);
  });

  it('rejects enrichment requests without IPs', async () => {
    await expect(enrichmentHandler({ ips: [] })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(enrichmentHandler({ addresses: ['198.51.100.7'] })).rejects.toBeInstanceOf(
      InvalidInputError
    );
  });

  it('rejects malformed correlation overrides', async () => {
    await expect(correlationHandler({ windowDays: -1 })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(correlationHandler({ countryCode: 'ZAF' })).rejects.toBeInstanceOf(
      InvalidInputError
    );
  });
});
