#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { StorageStack } from '../lib/stacks/storage-stack';
import { ThreatIntelStack } from '../lib/stacks/threat-intel-stack';
import { MonitoringStack } from '../lib/stacks/monitoring-stack';
import { APP_CONFIG } from '../lib/config/constants';

const app = new cdk.App();

const env = {
  account: APP_CONFIG.account,
  region: APP_CONFIG.region,
};

// Storage: feed/report bucket, DynamoDB tables, provider credentials
const storageStack = new StorageStack(app, 'SentinelThreatIntelStorageStack', {
  env,
  description: 'Storage layer (S3, DynamoDB, Secrets Manager) for Sentinel threat intelligence',
});

// Feed ingestion, IP enrichment and the scheduled correlation pass
const threatIntelStack = new ThreatIntelStack(app, 'SentinelThreatIntelStack', {
  env,
  description: 'Threat feed ingestion, IP enrichment and cyber-physical correlation Lambdas',
  bucket: storageStack.bucket,
  threatEventsTable: storageStack.threatEventsTable,
  enrichmentCacheTable: storageStack.enrichmentCacheTable,
  correlationsTable: storageStack.correlationsTable,
  evidenceTable: storageStack.evidenceTable,
  threatFeedsTable: storageStack.threatFeedsTable,
  providerCredentialsSecret: storageStack.providerCredentialsSecret,
});

threatIntelStack.addDependency(storageStack);

// Monitoring
const monitoringStack = new MonitoringStack(app, 'SentinelThreatIntelMonitoringStack', {
  env,
  description: 'CloudWatch dashboards and alarms',
  feedIngestionFunction: threatIntelStack.feedIngestionFunction,
  enrichmentFunction: threatIntelStack.enrichmentFunction,
  correlationFunction: threatIntelStack.correlationFunction,
  threatEventsTable: storageStack.threatEventsTable,
  correlationsTable: storageStack.correlationsTable,
});

monitoringStack.addDependency(threatIntelStack);
monitoringStack.addDependency(storageStack);

app.synth();
