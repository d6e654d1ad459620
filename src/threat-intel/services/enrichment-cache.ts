import { isIP } from 'net';
import type {
  EnrichmentBatchResult,
  EnrichmentRecord,
  PartialEnrichment,
  ProviderStats,
} from '../../shared/types';
import { InvalidInputError, ProviderError, describeError } from '../../shared/errors';
import { addHours, parseTimestamp } from '../../shared/utils/date-utils';
import { APP_CONFIG } from '../../../lib/config/constants';
import type { EnrichmentProvider } from '../providers';
import type { EnrichmentCacheRepository } from './repositories';
import { ThreatScorer } from './threat-scorer';

export interface EnrichmentCacheOptions {
  ttlHours?: number;
  providerTimeoutMs?: number;
  now?: () => Date;
}

interface ProviderOutcome {
  provider: string;
  ok: boolean;
  data: PartialEnrichment;
}

export class EnrichmentCache {
  private ttlHours: number;
  private providerTimeoutMs: number;
  private now: () => Date;
  private stats = new Map<string, ProviderStats>();

  constructor(
    private repository: EnrichmentCacheRepository,
    private providers: EnrichmentProvider[],
    private scorer: ThreatScorer,
    options: EnrichmentCacheOptions = {}
  ) {
    this.ttlHours = options.ttlHours ?? APP_CONFIG.enrichment.cacheTtlHours;
    this.providerTimeoutMs = options.providerTimeoutMs ?? APP_CONFIG.enrichment.providerTimeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Return the cached record for an IP while it is fresh, otherwise query every
   * provider and replace the record.
   */
  async getOrRefresh(ipAddress: string): Promise<EnrichmentRecord> {
    const { record } = await this.resolve(ipAddress);
    return record;
  }

  /**
   * Enrich a batch of IPs one at a time. Bad input and storage failures are
   * recorded per IP and do not stop the batch.
   */
  async enrichMany(ipAddresses: string[]): Promise<EnrichmentBatchResult> {
    const results: EnrichmentBatchResult['results'] = [];
    const before = this.snapshotStats();

    for (const ipAddress of [...new Set(ipAddresses)]) {
      try {
        const { record, fromCache } = await this.resolve(ipAddress);
        results.push({
          ipAddress: record.ipAddress,
          outcome: fromCache ? 'cache_hit' : 'refreshed',
          threatScore: record.threatScore,
        });
      } catch (error) {
        console.error(`Failed to enrich ${ipAddress}:`, error);
        results.push({
          ipAddress,
          outcome: error instanceof InvalidInputError ? 'invalid' : 'failed',
          error: describeError(error),
        });
      }
    }

    return { results, providers: this.diffStats(before) };
  }

  isExpired(record: EnrichmentRecord): boolean {
    const expiry = parseTimestamp(record.cacheExpiry);
    return expiry === null || expiry <= this.now().getTime();
  }

  /**
   * Provider success/failure counts since this cache was created
   */
  getProviderStats(): { [providerName: string]: ProviderStats } {
    return this.snapshotStats();
  }

  private async resolve(
    ipAddress: string
  ): Promise<{ record: EnrichmentRecord; fromCache: boolean }> {
    const ip = ipAddress.trim();
    if (isIP(ip) === 0) {
      throw new InvalidInputError(`Invalid IP address: "${ipAddress}"`);
    }

    const cached = await this.repository.get(ip);
    if (cached && !this.isExpired(cached)) {
      console.log(`Enrichment cache hit: ${ip}`);
      return { record: cached, fromCache: true };
    }

    return { record: await this.refresh(ip), fromCache: false };
  }

  private async refresh(ip: string): Promise<EnrichmentRecord> {
    console.log(`Enriching IP address: ${ip} (${this.providers.length} providers)`);
    const startTime = Date.now();

    const record: EnrichmentRecord = {
      ipAddress: ip,
      geoData: {},
      abuseData: {},
      exposureData: {},
      reputationData: {},
      threatScore: 0,
      lastUpdated: '',
      cacheExpiry: '',
    };

    // Sequential, in the configured order; each call is isolated
    for (const provider of this.providers) {
      const outcome = await this.lookupWithBoundary(provider, ip);
      this.recordOutcome(outcome);
      Object.assign(record, definedSections(outcome.data));
    }

    const score = this.scorer.calculateThreatScore(record);
    const now = this.now();
    record.threatScore = score.threatScore;
    record.lastUpdated = now.toISOString();
    record.cacheExpiry = addHours(now, this.ttlHours).toISOString();

    await this.repository.put(record);

    console.log(
      `Enriched ${ip} in ${Date.now() - startTime}ms - ${this.scorer.describe(score)}`
    );
    return record;
  }

  private async lookupWithBoundary(
    provider: EnrichmentProvider,
    ip: string
  ): Promise<ProviderOutcome> {
    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(
        () => reject(new ProviderError(provider.name, `timed out after ${this.providerTimeoutMs}ms`)),
        this.providerTimeoutMs
      );
    });

    try {
      const data = await Promise.race([provider.lookup(ip), timeout]);
      return { provider: provider.name, ok: true, data };
    } catch (error) {
      console.warn(`Failed to get ${provider.name} data for ${ip}: ${describeError(error)}`);
      return { provider: provider.name, ok: false, data: {} };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private recordOutcome(outcome: ProviderOutcome): void {
    const current = this.stats.get(outcome.provider) ?? { succeeded: 0, failed: 0 };
    this.stats.set(outcome.provider, {
      succeeded: current.succeeded + (outcome.ok ? 1 : 0),
      failed: current.failed + (outcome.ok ? 0 : 1),
    });
  }

  private snapshotStats(): { [providerName: string]: ProviderStats } {
    const snapshot: { [providerName: string]: ProviderStats } = {};
    for (const [name, stats] of this.stats) {
      snapshot[name] = { ...stats };
    }
    return snapshot;
  }

  private diffStats(before: { [providerName: string]: ProviderStats }): {
    [providerName: string]: ProviderStats;
  } {
    const diff: { [providerName: string]: ProviderStats } = {};
    for (const provider of this.providers) {
      const now = this.stats.get(provider.name) ?? { succeeded: 0, failed: 0 };
      const then = before[provider.name] ?? { succeeded: 0, failed: 0 };
      diff[provider.name] = {
        succeeded: now.succeeded - then.succeeded,
        failed: now.failed - then.failed,
      };
    }
    return diff;
  }
}

function definedSections(data: PartialEnrichment): PartialEnrichment {
  const sections: PartialEnrichment = {};
  if (data.geoData) sections.geoData = data.geoData;
  if (data.abuseData) sections.abuseData = data.abuseData;
  if (data.exposureData) sections.exposureData = data.exposureData;
  if (data.reputationData) sections.reputationData = data.reputationData;
  return sections;
}
