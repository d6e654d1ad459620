import * as cdk from 'aws-cdk-lib';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as nodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as s3n from 'aws-cdk-lib/aws-s3-notifications';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { APP_CONFIG } from '../config/constants';
import * as path from 'path';

interface ThreatIntelStackProps extends cdk.StackProps {
  bucket: s3.Bucket;
  threatEventsTable: dynamodb.Table;
  enrichmentCacheTable: dynamodb.Table;
  correlationsTable: dynamodb.Table;
  evidenceTable: dynamodb.Table;
  threatFeedsTable: dynamodb.Table;
  providerCredentialsSecret: secretsmanager.Secret;
}

export class ThreatIntelStack extends cdk.Stack {
  public readonly feedIngestionFunction: lambda.Function;
  public readonly enrichmentFunction: lambda.Function;
  public readonly correlationFunction: lambda.Function;

  constructor(scope: Construct, id: string, props: ThreatIntelStackProps) {
    super(scope, id, props);

    const environment: Record<string, string> = {
      BUCKET_NAME: props.bucket.bucketName,
      THREAT_EVENTS_TABLE: props.threatEventsTable.tableName,
      ENRICHMENT_CACHE_TABLE: props.enrichmentCacheTable.tableName,
      CORRELATIONS_TABLE: props.correlationsTable.tableName,
      EVIDENCE_TABLE: props.evidenceTable.tableName,
      THREAT_FEEDS_TABLE: props.threatFeedsTable.tableName,
      HOME_COUNTRY: APP_CONFIG.homeCountry,
      CACHE_TTL_HOURS: String(APP_CONFIG.enrichment.cacheTtlHours),
      PROVIDER_TIMEOUT_MS: String(APP_CONFIG.enrichment.providerTimeoutMs),
      ENRICH_ON_INGEST: 'true',
      ABUSEIPDB_API_KEY: props.providerCredentialsSecret.secretValueFromJson('abuseipdb').unsafeUnwrap(),
      SHODAN_API_KEY: props.providerCredentialsSecret.secretValueFromJson('shodan').unsafeUnwrap(),
      VIRUSTOTAL_API_KEY: props.providerCredentialsSecret.secretValueFromJson('virustotal').unsafeUnwrap(),
    };

    const entry = path.join(__dirname, '../../src/threat-intel/index.ts');
    const createFunction = (functionId: string, handler: string): nodejs.NodejsFunction =>
      new nodejs.NodejsFunction(this, functionId, {
        runtime: lambda.Runtime.NODEJS_20_X,
        entry,
        handler,
        timeout: cdk.Duration.seconds(APP_CONFIG.lambda.timeout),
        memorySize: APP_CONFIG.lambda.memorySize,
        reservedConcurrentExecutions: APP_CONFIG.lambda.reservedConcurrency,
        environment,
        bundling: {
          externalModules: ['@aws-sdk/*'],
        },
      });

    this.feedIngestionFunction = createFunction('FeedIngestionFunction', 'feedIngestionHandler');
    this.enrichmentFunction = createFunction('EnrichmentFunction', 'enrichmentHandler');
    this.correlationFunction = createFunction('CorrelationFunction', 'correlationHandler');

    // Grant permissions
    props.bucket.grantReadWrite(this.feedIngestionFunction);
    props.threatEventsTable.grantReadWriteData(this.feedIngestionFunction);
    props.threatFeedsTable.grantReadWriteData(this.feedIngestionFunction);
    props.enrichmentCacheTable.grantReadWriteData(this.feedIngestionFunction);

    props.enrichmentCacheTable.grantReadWriteData(this.enrichmentFunction);

    props.bucket.grantWrite(this.correlationFunction);
    props.threatEventsTable.grantReadData(this.correlationFunction);
    props.evidenceTable.grantReadData(this.correlationFunction);
    props.correlationsTable.grantReadWriteData(this.correlationFunction);

    // S3 Event Notification: ingest feed files dropped under /feeds/incoming/.
    // Imported by name so the notification lives in this stack (no cycle with storage).
    const feedBucket = s3.Bucket.fromBucketName(this, 'FeedBucket', props.bucket.bucketName);
    feedBucket.addEventNotification(
      s3.EventType.OBJECT_CREATED,
      new s3n.LambdaDestination(this.feedIngestionFunction),
      {
        prefix: APP_CONFIG.s3Prefixes.feedsIncoming,
      }
    );

    // Periodic correlation pass
    new events.Rule(this, 'CorrelationSchedule', {
      description: 'Run the cyber-physical correlation pass',
      schedule: events.Schedule.rate(cdk.Duration.hours(APP_CONFIG.correlation.scheduleHours)),
      targets: [new targets.LambdaFunction(this.correlationFunction)],
    });

    // Outputs
    new cdk.CfnOutput(this, 'FeedIngestionFunctionName', {
      value: this.feedIngestionFunction.functionName,
      description: 'Lambda function for threat feed ingestion',
      exportName: 'SentinelFeedIngestionFunction',
    });

    new cdk.CfnOutput(this, 'EnrichmentFunctionName', {
      value: this.enrichmentFunction.functionName,
      description: 'Lambda function for IP enrichment',
      exportName: 'SentinelEnrichmentFunction',
    });

    new cdk.CfnOutput(this, 'CorrelationFunctionName', {
      value: this.correlationFunction.functionName,
      description: 'Lambda function for the correlation pass',
      exportName: 'SentinelCorrelationFunction',
    });
  }
}
