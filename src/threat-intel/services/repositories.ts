import type {
  Correlation,
  EnrichmentRecord,
  PhysicalEvidenceEvent,
  ThreatEvent,
  ThreatFeed,
  ThreatReport,
} from '../../shared/types';

// Storage seams. Every write is an upsert keyed by the record's id; an
// implementation that cannot reach its store throws StorageError.

export interface ThreatEventRepository {
  upsert(event: ThreatEvent): Promise<void>;
  listSince(since: Date, countryCode?: string): Promise<ThreatEvent[]>;
}

export interface EnrichmentCacheRepository {
  get(ipAddress: string): Promise<EnrichmentRecord | null>;
  put(record: EnrichmentRecord): Promise<void>;
}

export interface CorrelationRepository {
  upsert(correlation: Correlation): Promise<void>;
  listSince(since: Date): Promise<Correlation[]>;
}

export interface EvidenceRepository {
  /** Rows that fail validation are logged and left out */
  listSince(since: Date): Promise<PhysicalEvidenceEvent[]>;
}

export interface ThreatFeedRepository {
  upsert(feed: ThreatFeed): Promise<void>;
}

export interface ReportStore {
  /** Returns the location the report was written to */
  save(report: ThreatReport): Promise<string>;
}
