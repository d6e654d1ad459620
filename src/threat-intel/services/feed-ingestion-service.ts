import type { GeoLocation, IngestionResult, ThreatEvent, ThreatFeed } from '../../shared/types';
import { InvalidInputError, describeError } from '../../shared/errors';
import { getCoordinates } from '../../shared/utils/geo-utils';
import { feedId, threatEventId } from '../../shared/utils/id-utils';
import type { EnrichmentCache } from './enrichment-cache';
import { type FeedFormat, type FeedRecord, validateFeedRecord } from './feed-parser';
import type { ThreatEventRepository, ThreatFeedRepository } from './repositories';

export interface FeedIngestionOptions {
  /** Fill missing coordinates from the enrichment cache */
  enrichment?: EnrichmentCache;
  now?: () => Date;
}

export class FeedIngestionService {
  private enrichment?: EnrichmentCache;
  private now: () => Date;

  constructor(
    private threatEvents: ThreatEventRepository,
    private feeds: ThreatFeedRepository,
    options: FeedIngestionOptions = {}
  ) {
    this.enrichment = options.enrichment;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validate and upsert a batch of feed records. Invalid records are reported,
   * failed writes are counted, and neither stops the batch.
   */
  async ingest(
    records: unknown[],
    source: string,
    feedType: FeedFormat = 'json'
  ): Promise<IngestionResult> {
    const sourceName = source.trim();
    if (!sourceName) {
      throw new InvalidInputError('Feed source name is required');
    }

    console.log(`Ingesting ${records.length} threat events from ${sourceName}`);
    const result: IngestionResult = {
      source: sourceName,
      received: records.length,
      ingested: 0,
      rejected: [],
      failed: [],
    };

    for (const [index, raw] of records.entries()) {
      const validation = validateFeedRecord(raw);
      if (!validation.success) {
        console.warn(`Rejected record ${index} from ${sourceName}: ${validation.reason}`);
        result.rejected.push({ index, reason: validation.reason });
        continue;
      }

      try {
        const event = this.toThreatEvent(validation.record, sourceName, validation.raw);
        if (this.enrichment && !getCoordinates(event.location)) {
          event.location = await this.locate(event);
        }

        await this.threatEvents.upsert(event);
        result.ingested++;
      } catch (error) {
        console.error(`Failed to store record ${index} from ${sourceName}:`, error);
        result.failed.push({ index, reason: describeError(error) });
      }
    }

    await this.updateFeedRegistry(sourceName, feedType, result);

    console.log(
      `Ingested ${result.ingested}/${result.received} events from ${sourceName} (${result.rejected.length} rejected, ${result.failed.length} failed)`
    );
    return result;
  }

  toThreatEvent(record: FeedRecord, source: string, raw: Record<string, unknown>): ThreatEvent {
    const location: GeoLocation = {
      latitude: record.latitude,
      longitude: record.longitude,
      city: record.city,
      region: record.region,
      countryCode: record.country_code,
      isp: record.isp,
      asn: record.asn,
    };
    const hasLocation = Object.values(location).some((value) => value !== undefined);

    return {
      eventId: threatEventId(record.ip, record.timestamp),
      ipAddress: record.ip,
      threatType: record.threat_type ?? 'unknown',
      severityScore: record.severity_score ?? 0,
      confidenceScore: record.confidence_score ?? 0,
      source,
      location: hasLocation ? stripUndefined(location) : undefined,
      timestamp: record.timestamp,
      firstSeen: record.first_seen ?? record.timestamp,
      lastSeen: record.last_seen ?? record.timestamp,
      reportCount: record.report_count ?? 0,
      categories: record.categories ?? [],
      rawData: { ...raw },
      ingestedAt: this.now().toISOString(),
    };
  }

  /**
   * Feed-supplied location fields win over enrichment data. An enrichment
   * failure leaves the event without coordinates.
   */
  private async locate(event: ThreatEvent): Promise<GeoLocation | undefined> {
    if (!this.enrichment) {
      return event.location;
    }

    try {
      const enrichment = await this.enrichment.getOrRefresh(event.ipAddress);
      const merged = stripUndefined({ ...enrichment.geoData, ...event.location });
      return Object.keys(merged).length > 0 ? merged : undefined;
    } catch (error) {
      console.warn(`Could not locate ${event.ipAddress}: ${describeError(error)}`);
      return event.location;
    }
  }

  private async updateFeedRegistry(
    source: string,
    feedType: FeedFormat,
    result: IngestionResult
  ): Promise<void> {
    const feed: ThreatFeed = {
      feedId: feedId(source),
      feedName: source,
      feedType,
      lastUpdated: this.now().toISOString(),
      recordCount: result.ingested,
      status: result.rejected.length > 0 || result.failed.length > 0 ? 'degraded' : 'active',
    };

    await this.feeds.upsert(feed);
  }
}

function stripUndefined(location: GeoLocation): GeoLocation {
  const cleaned: GeoLocation = {};
  for (const [key, value] of Object.entries(location)) {
    if (value !== undefined) {
      Object.assign(cleaned, { [key]: value });
    }
  }
  return cleaned;
}
