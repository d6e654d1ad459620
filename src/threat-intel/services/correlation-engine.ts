import type {
  Correlation,
  CorrelationPattern,
  CorrelationType,
  PairScore,
  PhysicalEvidenceEvent,
  ThreatEvent,
} from '../../shared/types';
import { describeDuration, secondsBetween } from '../../shared/utils/date-utils';
import { getCoordinates, haversineDistanceKm } from '../../shared/utils/geo-utils';
import { correlationId } from '../../shared/utils/id-utils';
import {
  CORRELATION_SCORING,
  DEFAULT_CORRELATION_PATTERNS,
} from '../../../lib/config/correlation-scoring';

/**
 * Ordered classifier: the first rule whose cyber and physical fragments both
 * appear (case-insensitive) names the correlation.
 */
const CORRELATION_TYPE_RULES: Array<{
  cyber: string;
  physical: string;
  type: CorrelationType;
}> = [
  { cyber: 'fraud', physical: 'anpr', type: 'fraud_vehicle_correlation' },
  { cyber: 'sim_swap', physical: 'theft', type: 'sim_swap_theft_correlation' },
  { cyber: 'phishing', physical: 'cyber_fraud', type: 'phishing_fraud_correlation' },
];

export interface CorrelationEngineOptions {
  patterns?: CorrelationPattern[];
  threshold?: number;
  now?: () => Date;
}

export class CorrelationEngine {
  private patterns: CorrelationPattern[];
  private threshold: number;
  private now: () => Date;

  constructor(options: CorrelationEngineOptions = {}) {
    this.patterns = options.patterns ?? DEFAULT_CORRELATION_PATTERNS;
    this.threshold = options.threshold ?? CORRELATION_SCORING.acceptanceThreshold;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Score every (cyber, physical) pair and keep those above the threshold
   */
  correlate(cyberEvents: ThreatEvent[], physicalEvents: PhysicalEvidenceEvent[]): Correlation[] {
    const createdAt = this.now().toISOString();
    const correlations: Correlation[] = [];

    for (const cyber of cyberEvents) {
      for (const physical of physicalEvents) {
        const pairScore = this.scorePair(cyber, physical);
        if (pairScore.score <= this.threshold) {
          continue;
        }

        correlations.push({
          correlationId: correlationId(cyber.eventId, physical.evidenceId),
          cyberEventId: cyber.eventId,
          physicalEventId: physical.evidenceId,
          correlationType: this.determineCorrelationType(cyber.threatType, physical.kind),
          correlationScore: pairScore.score,
          evidenceLinks: this.buildEvidenceLinks(cyber, physical, pairScore),
          createdAt,
        });
      }
    }

    console.log(
      `Correlated ${cyberEvents.length} cyber x ${physicalEvents.length} physical events: ${correlations.length} above ${this.threshold}`
    );
    return correlations;
  }

  /**
   * Temporal + spatial + pattern score for one pair, capped at 1.0
   */
  scorePair(cyber: ThreatEvent, physical: PhysicalEvidenceEvent): PairScore {
    const { temporal, spatial, pattern } = CORRELATION_SCORING;

    // Temporal proximity
    const timeDeltaSeconds = secondsBetween(cyber.timestamp, physical.timestamp);
    const temporalScore =
      timeDeltaSeconds !== null && timeDeltaSeconds < temporal.windowSeconds
        ? temporal.weight * (1 - timeDeltaSeconds / temporal.windowSeconds)
        : 0;

    // Geographic proximity (only when both sides carry coordinates)
    const from = getCoordinates(cyber.location);
    const to = getCoordinates(physical.location);
    const distanceKm = from && to ? haversineDistanceKm(from, to) : null;
    const spatialScore =
      distanceKm !== null && distanceKm < spatial.radiusKm
        ? spatial.weight * (1 - distanceKm / spatial.radiusKm)
        : 0;

    // Known cyber-physical patterns; every match adds its own contribution
    const matchedPatterns = this.patterns.filter(
      (candidate) =>
        candidate.cyberIndicators.includes(cyber.threatType) &&
        candidate.physicalIndicators.includes(physical.kind)
    );
    const patternScore = matchedPatterns.reduce(
      (sum, matched) => sum + matched.weight * pattern.multiplier,
      0
    );

    return {
      score: Math.min(temporalScore + spatialScore + patternScore, CORRELATION_SCORING.maxScore),
      breakdown: {
        temporal: temporalScore,
        spatial: spatialScore,
        pattern: patternScore,
      },
      timeDeltaSeconds,
      distanceKm,
      matchedPatterns,
    };
  }

  determineCorrelationType(cyberType: string, physicalKind: string): CorrelationType {
    const cyber = cyberType.toLowerCase();
    const physical = physicalKind.toLowerCase();

    const rule = CORRELATION_TYPE_RULES.find(
      (candidate) => cyber.includes(candidate.cyber) && physical.includes(candidate.physical)
    );
    return rule ? rule.type : 'general_correlation';
  }

  private buildEvidenceLinks(
    cyber: ThreatEvent,
    physical: PhysicalEvidenceEvent,
    pairScore: PairScore
  ): string[] {
    const links: string[] = [];

    if (pairScore.timeDeltaSeconds !== null) {
      links.push(`Events occurred ${describeDuration(pairScore.timeDeltaSeconds)} apart`);
    }

    if (pairScore.distanceKm !== null) {
      links.push(`Events occurred within ${pairScore.distanceKm.toFixed(1)}km of each other`);
    }

    for (const matched of pairScore.matchedPatterns) {
      links.push(`Matches ${matched.name} pattern (weight ${matched.weight})`);
    }

    links.push(
      `Cyber threat type '${cyber.threatType}' correlates with physical event type '${physical.kind}'`
    );

    return links;
  }
}
