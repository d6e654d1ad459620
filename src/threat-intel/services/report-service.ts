import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { v4 as uuidv4 } from 'uuid';
import type {
  Correlation,
  CorrelationTypeStatistics,
  GeoStatistics,
  SourceStatistics,
  ThreatEvent,
  ThreatReport,
  ThreatTypeStatistics,
} from '../../shared/types';
import { StorageError, describeError } from '../../shared/errors';
import { buildDateBasedS3Key, getUtcDateString } from '../../shared/utils/date-utils';
import { APP_CONFIG } from '../../../lib/config/constants';
import type { ReportStore } from './repositories';

export const HIGH_SEVERITY_THRESHOLD = 0.7;
const TOP_THREAT_TYPES = 10;
const TOP_LOCATIONS = 20;

export interface ReportInput {
  threatEvents: ThreatEvent[];
  correlations: Correlation[];
  periodDays: number;
  generatedAt: Date;
  reportId?: string;
}

/**
 * Aggregate threat events and correlations into a report with templated
 * recommendations
 */
export function buildThreatReport(input: ReportInput): ThreatReport {
  const allThreatTypes = summarizeThreatTypes(input.threatEvents);
  const sources = summarizeSources(input.threatEvents);
  const correlationTypes = summarizeCorrelationTypes(input.correlations);

  return {
    reportId: input.reportId ?? uuidv4(),
    generatedAt: input.generatedAt.toISOString(),
    periodDays: input.periodDays,
    threatStatistics: {
      totalEvents: input.threatEvents.length,
      sources,
      topThreatTypes: allThreatTypes.slice(0, TOP_THREAT_TYPES),
      geographicDistribution: summarizeLocations(input.threatEvents),
    },
    correlations: {
      totalCorrelations: input.correlations.length,
      correlationTypes,
    },
    recommendations: buildRecommendations(
      allThreatTypes,
      correlationTypes,
      sources,
      input.periodDays
    ),
  };
}

export function buildRecommendations(
  threatTypes: ThreatTypeStatistics[],
  correlationTypes: CorrelationTypeStatistics[],
  sources: SourceStatistics[],
  periodDays: number
): string[] {
  const recommendations: string[] = [];

  // High-severity threat types
  const highSeverity = threatTypes
    .filter((stats) => stats.avgSeverity > HIGH_SEVERITY_THRESHOLD)
    .sort((a, b) => b.avgSeverity - a.avgSeverity || a.threatType.localeCompare(b.threatType));
  if (highSeverity.length > 0) {
    const top = highSeverity[0];
    recommendations.push(
      `Focus on ${top.threatType} threats - highest severity score (${top.avgSeverity.toFixed(2)})`
    );
  }

  // Most frequent correlation type
  if (correlationTypes.length > 0) {
    const top = correlationTypes[0];
    recommendations.push(
      `Investigate ${top.correlationType} correlations - ${top.correlationCount} instances found`
    );
  }

  // Busiest feed
  if (sources.length > 0) {
    const top = sources[0];
    recommendations.push(
      `Monitor ${top.source} feed closely - ${top.eventCount} events in last ${periodDays} days`
    );
  }

  return recommendations;
}

function summarizeSources(events: ThreatEvent[]): SourceStatistics[] {
  return groupBy(events, (event) => event.source)
    .map(([source, group]) => ({
      source,
      eventCount: group.length,
      avgSeverity: average(group.map((event) => event.severityScore)),
      avgConfidence: average(group.map((event) => event.confidenceScore)),
    }))
    .sort((a, b) => b.eventCount - a.eventCount || a.source.localeCompare(b.source));
}

function summarizeThreatTypes(events: ThreatEvent[]): ThreatTypeStatistics[] {
  return groupBy(events, (event) => event.threatType)
    .map(([threatType, group]) => ({
      threatType,
      count: group.length,
      avgSeverity: average(group.map((event) => event.severityScore)),
    }))
    .sort((a, b) => b.count - a.count || a.threatType.localeCompare(b.threatType));
}

function summarizeLocations(events: ThreatEvent[]): GeoStatistics[] {
  const located = events.filter((event) => event.location?.countryCode);

  return groupBy(located, (event) =>
    JSON.stringify([event.location?.countryCode ?? '', event.location?.city ?? ''])
  )
    .map(([, group]) => ({
      countryCode: group[0].location?.countryCode ?? '',
      city: group[0].location?.city ?? '',
      eventCount: group.length,
      avgSeverity: average(group.map((event) => event.severityScore)),
    }))
    .sort(
      (a, b) =>
        b.eventCount - a.eventCount ||
        a.countryCode.localeCompare(b.countryCode) ||
        a.city.localeCompare(b.city)
    )
    .slice(0, TOP_LOCATIONS);
}

function summarizeCorrelationTypes(correlations: Correlation[]): CorrelationTypeStatistics[] {
  return groupBy(correlations, (correlation) => correlation.correlationType)
    .map(([correlationType, group]) => ({
      correlationType,
      correlationCount: group.length,
      avgScore: average(group.map((correlation) => correlation.correlationScore)),
    }))
    .sort(
      (a, b) =>
        b.correlationCount - a.correlationCount ||
        a.correlationType.localeCompare(b.correlationType)
    );
}

function groupBy<T, K extends string>(items: T[], keyOf: (item: T) => K): Array<[K, T[]]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return [...groups.entries()];
}

function average(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Format the report as the multi-line summary written to the job log
 */
export function formatReportSummary(report: ThreatReport): string {
  const types = report.correlations.correlationTypes
    .map(
      (stats) =>
        `• ${stats.correlationType}: ${stats.correlationCount} (avg score ${stats.avgScore.toFixed(2)})`
    )
    .join('\n');
  const recommendations = report.recommendations.map((line) => `• ${line}`).join('\n');

  return `
THREAT INTELLIGENCE REPORT ${report.reportId}

Generated: ${report.generatedAt}
Threat events (last ${report.periodDays} days): ${report.threatStatistics.totalEvents}
Correlations: ${report.correlations.totalCorrelations}

Correlation Types:
${types || '• none'}

Recommendations:
${recommendations || '• none'}
`.trim();
}

/**
 * Writes reports as JSON objects under the date-partitioned reports prefix
 */
export class S3ReportStore implements ReportStore {
  private s3Client: Pick<S3Client, 'send'>;

  constructor(
    private bucketName: string,
    private prefix: string = APP_CONFIG.s3Prefixes.reports,
    s3Client?: Pick<S3Client, 'send'>
  ) {
    this.s3Client = s3Client ?? new S3Client({});
  }

  async save(report: ThreatReport): Promise<string> {
    const key = buildDateBasedS3Key(
      this.prefix,
      `threat-intelligence-report-${report.reportId}.json`,
      getUtcDateString(new Date(report.generatedAt))
    );

    try {
      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: this.bucketName,
          Key: key,
          Body: JSON.stringify(report, null, 2),
          ContentType: 'application/json',
        })
      );
    } catch (error) {
      throw new StorageError(`Failed to write report to s3://${this.bucketName}/${key}: ${describeError(error)}`, error);
    }

    console.log(`Report saved to s3://${this.bucketName}/${key}`);
    return `s3://${this.bucketName}/${key}`;
  }
}
