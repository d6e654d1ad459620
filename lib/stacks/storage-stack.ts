import * as cdk from 'aws-cdk-lib';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { APP_CONFIG } from '../config/constants';

export class StorageStack extends cdk.Stack {
  public readonly bucket: s3.Bucket;
  public readonly threatEventsTable: dynamodb.Table;
  public readonly enrichmentCacheTable: dynamodb.Table;
  public readonly correlationsTable: dynamodb.Table;
  public readonly evidenceTable: dynamodb.Table;
  public readonly threatFeedsTable: dynamodb.Table;
  public readonly providerCredentialsSecret: secretsmanager.Secret;

  constructor(scope: Construct, id: string, props?: cdk.StackProps) {
    super(scope, id, props);

    // S3 Bucket for feed drops and reports
    this.bucket = new s3.Bucket(this, 'ThreatIntelBucket', {
      bucketName: `${APP_CONFIG.bucketName}-${APP_CONFIG.account}`,
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
      lifecycleRules: [
        {
          id: 'ProcessedFeedsGlacierTransition',
          prefix: APP_CONFIG.s3Prefixes.feedsProcessed,
          transitions: [
            {
              storageClass: s3.StorageClass.GLACIER,
              transitionAfter: cdk.Duration.days(30),
            },
          ],
          expiration: cdk.Duration.days(365),
        },
      ],
    });

    // DynamoDB Table: threat_events (content-addressed by ip + timestamp)
    this.threatEventsTable = new dynamodb.Table(this, 'ThreatEventsTable', {
      tableName: APP_CONFIG.tables.threatEvents,
      partitionKey: {
        name: 'eventId',
        type: dynamodb.AttributeType.STRING,
      },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
      pointInTimeRecovery: true,
    });

    // GSI1: source-timestamp-index (events per feed)
    this.threatEventsTable.addGlobalSecondaryIndex({
      indexName: 'source-timestamp-index',
      partitionKey: {
        name: 'source',
        type: dynamodb.AttributeType.STRING,
      },
      sortKey: {
        name: 'timestamp',
        type: dynamodb.AttributeType.STRING,
      },
      projectionType: dynamodb.ProjectionType.ALL,
    });

    // DynamoDB Table: ip_enrichment_cache (one live record per IP)
    this.enrichmentCacheTable = new dynamodb.Table(this, 'EnrichmentCacheTable', {
      tableName: APP_CONFIG.tables.enrichmentCache,
      partitionKey: {
        name: 'ipAddress',
        type: dynamodb.AttributeType.STRING,
      },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    // DynamoDB Table: cyber_physical_correlations
    this.correlationsTable = new dynamodb.Table(this, 'CorrelationsTable', {
      tableName: APP_CONFIG.tables.correlations,
      partitionKey: {
        name: 'correlationId',
        type: dynamodb.AttributeType.STRING,
      },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
      pointInTimeRecovery: true,
    });

    // GSI1: cyberEventId-index (correlations for one cyber event)
    this.correlationsTable.addGlobalSecondaryIndex({
      indexName: 'cyberEventId-index',
      partitionKey: {
        name: 'cyberEventId',
        type: dynamodb.AttributeType.STRING,
      },
      projectionType: dynamodb.ProjectionType.ALL,
    });

    // DynamoDB Table: evidence (written by case management, read here)
    this.evidenceTable = new dynamodb.Table(this, 'EvidenceTable', {
      tableName: APP_CONFIG.tables.evidence,
      partitionKey: {
        name: 'evidenceId',
        type: dynamodb.AttributeType.STRING,
      },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
      pointInTimeRecovery: true,
    });

    // DynamoDB Table: threat_feeds (feed registry)
    this.threatFeedsTable = new dynamodb.Table(this, 'ThreatFeedsTable', {
      tableName: APP_CONFIG.tables.threatFeeds,
      partitionKey: {
        name: 'feedId',
        type: dynamodb.AttributeType.STRING,
      },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    // Secrets Manager: provider API keys (fill in after deploy)
    this.providerCredentialsSecret = new secretsmanager.Secret(this, 'ProviderCredentialsSecret', {
      secretName: APP_CONFIG.secrets.providerCredentials,
      description: 'API keys for AbuseIPDB, Shodan and VirusTotal',
      generateSecretString: {
        secretStringTemplate: JSON.stringify({
          abuseipdb: '',
          shodan: '',
          virustotal: '',
        }),
        generateStringKey: 'placeholder',
      },
    });

    // Outputs
    new cdk.CfnOutput(this, 'BucketName', {
      value: this.bucket.bucketName,
      description: 'S3 bucket for threat feeds and reports',
      exportName: 'SentinelThreatIntelBucketName',
    });

    new cdk.CfnOutput(this, 'ThreatEventsTableName', {
      value: this.threatEventsTable.tableName,
      description: 'DynamoDB table for ingested threat events',
      exportName: 'SentinelThreatEventsTable',
    });

    new cdk.CfnOutput(this, 'CorrelationsTableName', {
      value: this.correlationsTable.tableName,
      description: 'DynamoDB table for cyber-physical correlations',
      exportName: 'SentinelCorrelationsTable',
    });
  }
}
