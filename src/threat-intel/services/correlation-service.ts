import type { Correlation, ThreatReport } from '../../shared/types';
import { subtractDays } from '../../shared/utils/date-utils';
import { APP_CONFIG } from '../../../lib/config/constants';
import { CorrelationEngine } from './correlation-engine';
import { buildThreatReport, formatReportSummary } from './report-service';
import type {
  CorrelationRepository,
  EvidenceRepository,
  ReportStore,
  ThreatEventRepository,
} from './repositories';

export interface CorrelationPassOptions {
  now?: Date;
  windowDays?: number;
  reportPeriodDays?: number;
  /** Only correlate cyber events located in this country */
  countryCode?: string;
}

export interface CorrelationPassResult {
  correlations: Correlation[];
  report: ThreatReport;
  reportLocation: string;
}

/**
 * The periodic batch job: load the rolling window, correlate, persist, report.
 * Storage failures propagate so the scheduler sees a failed run and retries;
 * every write is an upsert by id, so a re-run is safe.
 */
export class CorrelationService {
  constructor(
    private engine: CorrelationEngine,
    private threatEvents: ThreatEventRepository,
    private evidence: EvidenceRepository,
    private correlations: CorrelationRepository,
    private reports: ReportStore
  ) {}

  async runCorrelationPass(options: CorrelationPassOptions = {}): Promise<CorrelationPassResult> {
    const now = options.now ?? new Date();
    const windowDays = options.windowDays ?? APP_CONFIG.correlation.windowDays;
    const reportPeriodDays = options.reportPeriodDays ?? APP_CONFIG.correlation.reportPeriodDays;
    const windowStart = subtractDays(now, windowDays);

    console.log(
      `Correlating cyber and physical threats since ${windowStart.toISOString()}${options.countryCode ? ` (country ${options.countryCode})` : ''}`
    );
    const startTime = Date.now();

    const cyberEvents = await this.threatEvents.listSince(windowStart, options.countryCode);
    const physicalEvents = await this.evidence.listSince(windowStart);

    const correlations = this.engine.correlate(cyberEvents, physicalEvents);
    for (const correlation of correlations) {
      await this.correlations.upsert(correlation);
    }

    // The report covers the whole period, not just this pass
    const reportStart = subtractDays(now, reportPeriodDays);
    const reportEvents = await this.threatEvents.listSince(reportStart);
    const reportCorrelations = new Map<string, Correlation>();
    for (const stored of await this.correlations.listSince(reportStart)) {
      reportCorrelations.set(stored.correlationId, stored);
    }
    for (const correlation of correlations) {
      reportCorrelations.set(correlation.correlationId, correlation);
    }

    const report = buildThreatReport({
      threatEvents: reportEvents,
      correlations: [...reportCorrelations.values()],
      periodDays: reportPeriodDays,
      generatedAt: now,
    });
    const reportLocation = await this.reports.save(report);

    console.log(formatReportSummary(report));
    console.log(
      `Correlation pass complete in ${Date.now() - startTime}ms: ${correlations.length} correlations stored`
    );

    return { correlations, report, reportLocation };
  }
}
