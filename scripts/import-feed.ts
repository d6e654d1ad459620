#!/usr/bin/env ts-node
import * as fs from 'fs';
import * as path from 'path';
import { APP_CONFIG } from '../lib/config/constants';
import {
  createDocumentClient,
  DynamoDBThreatEventRepository,
  DynamoDBThreatFeedRepository,
} from '../src/threat-intel/services/dynamodb-service';
import { FeedIngestionService } from '../src/threat-intel/services/feed-ingestion-service';
import { detectFeedFormat, parseFeedFile } from '../src/threat-intel/services/feed-parser';

// Usage: ts-node scripts/import-feed.ts <feed-file.(json|csv)> <source-name>
async function importFeed() {
  const [filePath, source] = process.argv.slice(2);
  if (!filePath || !source) {
    console.error('Usage: import-feed <feed-file.(json|csv)> <source-name>');
    process.exit(1);
  }

  const format = detectFeedFormat(filePath);
  if (!format) {
    console.error(`Unsupported feed file extension: ${path.extname(filePath) || '(none)'}`);
    process.exit(1);
  }

  const feedFilePath = path.resolve(filePath);
  console.log('Reading feed file:', feedFilePath);

  const body = fs.readFileSync(feedFilePath, 'utf-8');
  const records = parseFeedFile(body, format);
  console.log(`Parsed ${records.length} records (${format})`);

  const docClient = createDocumentClient();
  const service = new FeedIngestionService(
    new DynamoDBThreatEventRepository(docClient, APP_CONFIG.tables.threatEvents),
    new DynamoDBThreatFeedRepository(docClient, APP_CONFIG.tables.threatFeeds)
  );

  const result = await service.ingest(records, source, format);

  console.log('\nImport complete:');
  console.log(`- Received: ${result.received}`);
  console.log(`- Ingested: ${result.ingested}`);
  console.log(`- Rejected: ${result.rejected.length}`);
  console.log(`- Failed: ${result.failed.length}`);

  for (const rejected of result.rejected) {
    console.log(`  record ${rejected.index}: ${rejected.reason}`);
  }
}

importFeed().catch((error) => {
  console.error('Error importing feed:', error);
  process.exit(1);
});
