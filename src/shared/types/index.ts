export interface GeoLocation {
  latitude?: number;
  longitude?: number;
  city?: string;
  region?: string;
  country?: string;
  countryCode?: string;
  isp?: string;
  asn?: string;
}

export interface ThreatEvent {
  eventId: string;
  ipAddress: string;
  threatType: string; // free-form tag, e.g. "phishing", "sim_swap"
  severityScore: number;
  confidenceScore: number;
  source: string;
  location?: GeoLocation;
  timestamp: string; // event time used for correlation and id derivation
  firstSeen: string;
  lastSeen: string;
  reportCount: number;
  categories: string[];
  rawData: Record<string, unknown>;
  ingestedAt: string;
}

export interface PhysicalEvidenceEvent {
  evidenceId: string;
  kind: string; // e.g. "anpr_hit", "phone_theft", "cyber_fraud"
  location?: GeoLocation;
  timestamp: string;
  metadata: Record<string, unknown>;
}

export interface AbuseData {
  abuseConfidenceScore?: number;
  totalReports?: number;
  lastReportedAt?: string | null;
  countryCode?: string;
  usageType?: string;
  isPublic?: boolean;
  isWhitelisted?: boolean;
}

export interface ExposureData {
  ports?: number[];
  organization?: string;
  hostnames?: string[];
  vulnerabilities?: string[];
  vulnerabilityCount?: number;
}

export interface ReputationData {
  malicious?: number;
  suspicious?: number;
  harmless?: number;
  undetected?: number;
  reputation?: number;
}

/**
 * What a single provider contributes to an enrichment. Every provider fills
 * at most one section.
 */
export interface PartialEnrichment {
  geoData?: GeoLocation;
  abuseData?: AbuseData;
  exposureData?: ExposureData;
  reputationData?: ReputationData;
}

export interface EnrichmentRecord {
  ipAddress: string;
  geoData: GeoLocation;
  abuseData: AbuseData;
  exposureData: ExposureData;
  reputationData: ReputationData;
  threatScore: number;
  lastUpdated: string;
  cacheExpiry: string;
}

export interface ThreatScoreResult {
  threatScore: number;
  breakdown: { [key: string]: number };
}

export type CorrelationType =
  | 'fraud_vehicle_correlation'
  | 'sim_swap_theft_correlation'
  | 'phishing_fraud_correlation'
  | 'general_correlation';

export interface Correlation {
  correlationId: string;
  cyberEventId: string;
  physicalEventId: string;
  correlationType: CorrelationType;
  correlationScore: number;
  evidenceLinks: string[];
  createdAt: string;
}

export interface CorrelationPattern {
  name: string;
  cyberIndicators: string[];
  physicalIndicators: string[];
  weight: number; // 0.0 - 1.0
}

export interface PairScore {
  score: number;
  breakdown: {
    temporal: number;
    spatial: number;
    pattern: number;
  };
  timeDeltaSeconds: number | null;
  distanceKm: number | null;
  matchedPatterns: CorrelationPattern[];
}

export interface ThreatFeed {
  feedId: string;
  feedName: string;
  feedType: 'json' | 'csv';
  lastUpdated: string;
  recordCount: number;
  status: 'active' | 'degraded';
}

export interface RejectedRecord {
  index: number;
  reason: string;
}

export interface IngestionResult {
  source: string;
  received: number;
  ingested: number;
  rejected: RejectedRecord[];
  failed: RejectedRecord[];
}

export type EnrichmentOutcome = 'cache_hit' | 'refreshed' | 'invalid' | 'failed';

export interface ProviderStats {
  succeeded: number;
  failed: number;
}

export interface EnrichmentBatchResult {
  results: Array<{
    ipAddress: string;
    outcome: EnrichmentOutcome;
    threatScore?: number;
    error?: string;
  }>;
  providers: { [providerName: string]: ProviderStats };
}

export interface SourceStatistics {
  source: string;
  eventCount: number;
  avgSeverity: number;
  avgConfidence: number;
}

export interface ThreatTypeStatistics {
  threatType: string;
  count: number;
  avgSeverity: number;
}

export interface GeoStatistics {
  countryCode: string;
  city: string;
  eventCount: number;
  avgSeverity: number;
}

export interface CorrelationTypeStatistics {
  correlationType: CorrelationType;
  correlationCount: number;
  avgScore: number;
}

export interface ThreatReport {
  reportId: string;
  generatedAt: string;
  periodDays: number;
  threatStatistics: {
    totalEvents: number;
    sources: SourceStatistics[];
    topThreatTypes: ThreatTypeStatistics[];
    geographicDistribution: GeoStatistics[];
  };
  correlations: {
    totalCorrelations: number;
    correlationTypes: CorrelationTypeStatistics[];
  };
  recommendations: string[];
}
