import type { S3Event, S3EventRecord, ScheduledEvent } from 'aws-lambda';
import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { loadRuntimeConfig, type RuntimeConfig } from '../shared/config';
import { InvalidInputError, StorageError } from '../shared/errors';
import type { EnrichmentBatchResult, IngestionResult } from '../shared/types';
import { buildDateBasedS3Key, extractFilename } from '../shared/utils/date-utils';
import { APP_CONFIG } from '../../lib/config/constants';
import { buildProviders } from './providers';
import { CorrelationEngine } from './services/correlation-engine';
import { CorrelationService } from './services/correlation-service';
import {
  createDocumentClient,
  DynamoDBCorrelationRepository,
  DynamoDBEnrichmentCacheRepository,
  DynamoDBEvidenceRepository,
  DynamoDBThreatEventRepository,
  DynamoDBThreatFeedRepository,
} from './services/dynamodb-service';
import { EnrichmentCache } from './services/enrichment-cache';
import { FeedIngestionService } from './services/feed-ingestion-service';
import { parseFeedFile, parseFeedObjectKey } from './services/feed-parser';
import { S3ReportStore } from './services/report-service';
import { ThreatScorer } from './services/threat-scorer';

interface Services {
  config: RuntimeConfig;
  s3Client: S3Client;
  enrichmentCache: EnrichmentCache;
  feedIngestion: FeedIngestionService;
  correlation: CorrelationService;
}

// Initialize services once per container (reused across invocations)
let services: Services | null = null;

function getServices(): Services {
  if (services) {
    return services;
  }

  const config = loadRuntimeConfig();
  const docClient = createDocumentClient();
  const s3Client = new S3Client({});

  const threatEvents = new DynamoDBThreatEventRepository(docClient, config.tables.threatEvents);
  const enrichmentCache = new EnrichmentCache(
    new DynamoDBEnrichmentCacheRepository(docClient, config.tables.enrichmentCache),
    buildProviders({
      credentials: config.credentials,
      disabledProviders: config.disabledProviders,
      timeoutMs: config.providerTimeoutMs,
    }),
    new ThreatScorer(config.homeCountry),
    { ttlHours: config.cacheTtlHours, providerTimeoutMs: config.providerTimeoutMs }
  );

  services = {
    config,
    s3Client,
    enrichmentCache,
    feedIngestion: new FeedIngestionService(
      threatEvents,
      new DynamoDBThreatFeedRepository(docClient, config.tables.threatFeeds),
      { enrichment: config.enrichOnIngest ? enrichmentCache : undefined }
    ),
    correlation: new CorrelationService(
      new CorrelationEngine(),
      threatEvents,
      new DynamoDBEvidenceRepository(docClient, config.tables.evidence),
      new DynamoDBCorrelationRepository(docClient, config.tables.correlations),
      new S3ReportStore(config.bucketName, APP_CONFIG.s3Prefixes.reports, s3Client)
    ),
  };
  return services;
}

/**
 * S3 trigger: a feed file was dropped under the incoming prefix
 */
export const feedIngestionHandler = async (event: S3Event): Promise<IngestionResult[]> => {
  console.log('Feed ingestion Lambda triggered');
  console.log('Event:', JSON.stringify(event, null, 2));

  const results: IngestionResult[] = [];
  const failures: string[] = [];

  // Process each S3 record
  for (const record of event.Records) {
    try {
      const result = await ingestFeedObject(record);
      if (result) {
        results.push(result);
      }
    } catch (error) {
      console.error('Error ingesting feed file:', error);
      failures.push(record.s3.object.key);
      // Continue processing other records
    }
  }

  if (failures.length > 0) {
    throw new Error(`Failed to ingest ${failures.length} feed file(s): ${failures.join(', ')}`);
  }

  return results;
};

async function ingestFeedObject(record: S3EventRecord): Promise<IngestionResult | null> {
  const { s3Client, feedIngestion } = getServices();
  const bucketName = record.s3.bucket.name;
  const s3Key = decodeURIComponent(record.s3.object.key.replace(/\+/g, ' '));

  const feed = parseFeedObjectKey(s3Key, APP_CONFIG.s3Prefixes.feedsIncoming);
  if (!feed) {
    console.log(`Skipping ${s3Key}: not a feed file under ${APP_CONFIG.s3Prefixes.feedsIncoming}`);
    return null;
  }

  console.log(`Processing feed file: s3://${bucketName}/${s3Key} (${feed.source}, ${feed.format})`);

  const response = await s3Client.send(new GetObjectCommand({ Bucket: bucketName, Key: s3Key }));
  const body = await response.Body?.transformToString();
  if (body === undefined) {
    throw new Error(`Empty response from S3 for ${s3Key}`);
  }

  const result = await feedIngestion.ingest(parseFeedFile(body, feed.format), feed.source, feed.format);

  // Leave the file under incoming/ so a retry re-ingests it; upserts by id make that safe
  if (result.failed.length > 0) {
    throw new StorageError(
      `${result.failed.length} of ${result.received} records from ${s3Key} could not be stored`
    );
  }

  await moveToProcessed(bucketName, s3Key, feed.source);
  return result;
}

async function moveToProcessed(bucketName: string, sourceKey: string, source: string): Promise<void> {
  const { s3Client } = getServices();
  const destinationKey = buildDateBasedS3Key(
    `${APP_CONFIG.s3Prefixes.feedsProcessed}${source}`,
    extractFilename(sourceKey)
  );

  await s3Client.send(
    new CopyObjectCommand({
      Bucket: bucketName,
      CopySource: `${bucketName}/${sourceKey}`,
      Key: destinationKey,
    })
  );
  await s3Client.send(new DeleteObjectCommand({ Bucket: bucketName, Key: sourceKey }));

  console.log(`Feed file moved to ${destinationKey}`);
}

const EnrichmentRequestSchema = z.object({
  ips: z.array(z.string()).min(1),
});

/**
 * Direct invocation: { "ips": ["41.0.0.1", ...] }
 */
export const enrichmentHandler = async (event: unknown): Promise<EnrichmentBatchResult> => {
  const request = EnrichmentRequestSchema.safeParse(event);
  if (!request.success) {
    throw new InvalidInputError(fromZodError(request.error).toString());
  }

  const { enrichmentCache } = getServices();
  const result = await enrichmentCache.enrichMany(request.data.ips);

  for (const [provider, stats] of Object.entries(result.providers)) {
    console.log(`Provider ${provider}: ${stats.succeeded} succeeded, ${stats.failed} failed`);
  }
  return result;
};

const CorrelationRequestSchema = z
  .object({
    windowDays: z.number().positive().optional(),
    reportPeriodDays: z.number().positive().optional(),
    countryCode: z.string().length(2).toUpperCase().optional(),
  })
  .passthrough();

/**
 * EventBridge schedule (or manual invoke with window overrides)
 */
export const correlationHandler = async (
  event: ScheduledEvent | Record<string, unknown>
): Promise<{ correlationCount: number; reportId: string; reportLocation: string }> => {
  console.log('Correlation Lambda triggered');

  const request = CorrelationRequestSchema.safeParse(event);
  if (!request.success) {
    throw new InvalidInputError(fromZodError(request.error).toString());
  }

  const { config, correlation } = getServices();
  const result = await correlation.runCorrelationPass({
    windowDays: request.data.windowDays,
    reportPeriodDays: request.data.reportPeriodDays,
    countryCode: request.data.countryCode ?? config.correlationCountry,
  });

  return {
    correlationCount: result.correlations.length,
    reportId: result.report.reportId,
    reportLocation: result.reportLocation,
  };
};
