import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { APP_CONFIG } from '../../lib/config/constants';
import { ConfigurationError } from './errors';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value || '')
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const RuntimeEnvSchema = z.object({
  BUCKET_NAME: z.string().min(1),
  THREAT_EVENTS_TABLE: z.string().min(1),
  ENRICHMENT_CACHE_TABLE: z.string().min(1),
  CORRELATIONS_TABLE: z.string().min(1),
  EVIDENCE_TABLE: z.string().min(1),
  THREAT_FEEDS_TABLE: z.string().min(1),
  HOME_COUNTRY: optionalString,
  CORRELATION_COUNTRY: optionalString,
  ABUSEIPDB_API_KEY: optionalString,
  SHODAN_API_KEY: optionalString,
  VIRUSTOTAL_API_KEY: optionalString,
  DISABLED_PROVIDERS: commaList,
  ENRICH_ON_INGEST: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
  CACHE_TTL_HOURS: z.coerce.number().positive().default(APP_CONFIG.enrichment.cacheTtlHours),
  PROVIDER_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(APP_CONFIG.enrichment.providerTimeoutMs),
});

export interface ProviderCredentials {
  abuseIpDbKey?: string;
  shodanKey?: string;
  virusTotalKey?: string;
}

export interface RuntimeConfig {
  bucketName: string;
  tables: {
    threatEvents: string;
    enrichmentCache: string;
    correlations: string;
    evidence: string;
    threatFeeds: string;
  };
  homeCountry?: string;
  correlationCountry?: string;
  credentials: ProviderCredentials;
  disabledProviders: string[];
  enrichOnIngest: boolean;
  cacheTtlHours: number;
  providerTimeoutMs: number;
}

/**
 * Read and validate the Lambda environment. Missing table names or a bad
 * numeric override fail the cold start.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = RuntimeEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(fromZodError(parsed.error).toString());
  }

  const vars = parsed.data;
  return {
    bucketName: vars.BUCKET_NAME,
    tables: {
      threatEvents: vars.THREAT_EVENTS_TABLE,
      enrichmentCache: vars.ENRICHMENT_CACHE_TABLE,
      correlations: vars.CORRELATIONS_TABLE,
      evidence: vars.EVIDENCE_TABLE,
      threatFeeds: vars.THREAT_FEEDS_TABLE,
    },
    homeCountry: vars.HOME_COUNTRY?.toUpperCase(),
    correlationCountry: vars.CORRELATION_COUNTRY?.toUpperCase(),
    credentials: {
      abuseIpDbKey: vars.ABUSEIPDB_API_KEY,
      shodanKey: vars.SHODAN_API_KEY,
      virusTotalKey: vars.VIRUSTOTAL_API_KEY,
    },
    disabledProviders: vars.DISABLED_PROVIDERS,
    enrichOnIngest: vars.ENRICH_ON_INGEST,
    cacheTtlHours: vars.CACHE_TTL_HOURS,
    providerTimeoutMs: vars.PROVIDER_TIMEOUT_MS,
  };
}
