export const APP_CONFIG = {
  // AWS Configuration
  account: process.env.CDK_DEFAULT_ACCOUNT || '000000000000',
  region: 'af-south-1',

  // Home country (lower base risk in the threat score)
  homeCountry: 'ZA',

  // S3 Configuration
  bucketName: 'sentinel-threat-intel',
  s3Prefixes: {
    feedsIncoming: 'threat_intel/feeds/incoming/',
    feedsProcessed: 'threat_intel/feeds/processed/',
    reports: 'threat_intel/reports/',
  },

  // DynamoDB Tables
  tables: {
    threatEvents: 'threat_events',
    enrichmentCache: 'ip_enrichment_cache',
    correlations: 'cyber_physical_correlations',
    evidence: 'evidence',
    threatFeeds: 'threat_feeds',
  },

  // IP enrichment cache
  enrichment: {
    cacheTtlHours: 24,
    providerTimeoutMs: 10_000,
  },

  // External threat data providers
  providers: {
    ipApi: 'https://ipapi.co',
    abuseIpDb: 'https://api.abuseipdb.com/api/v2',
    shodan: 'https://api.shodan.io/shodan',
    virusTotal: 'https://www.virustotal.com/api/v3',
    abuseMaxAgeDays: 90,
  },

  // Correlation batch job
  correlation: {
    windowDays: 7,
    reportPeriodDays: 30,
    scheduleHours: 6,
  },

  // Secrets Manager
  secrets: {
    providerCredentials: 'sentinel/threat-intel-provider-keys',
  },

  // Lambda Configuration
  lambda: {
    timeout: 300,             // seconds
    memorySize: 512,          // MB
    reservedConcurrency: 5,   // Keep provider rate limits in check
  },
};

export const PROVIDER_NAMES = {
  IP_API: 'ip-api',
  ABUSEIPDB: 'abuseipdb',
  SHODAN: 'shodan',
  VIRUSTOTAL: 'virustotal',
} as const;
