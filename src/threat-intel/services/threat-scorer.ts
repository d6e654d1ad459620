import type { AbuseData, ExposureData, GeoLocation, ThreatScoreResult } from '../../shared/types';
import { THREAT_SCORING } from '../../../lib/config/correlation-scoring';

export interface ThreatScoreInputs {
  geoData: GeoLocation;
  abuseData: AbuseData;
  exposureData: ExposureData;
}

export class ThreatScorer {
  private homeCountry?: string;

  constructor(homeCountry?: string) {
    this.homeCountry = homeCountry?.toUpperCase();
  }

  /**
   * Score an IP from its enrichment data:
   *   0.6 * abuse confidence + 0.3 * capped vulnerability count + geographic base
   */
  calculateThreatScore(inputs: ThreatScoreInputs): ThreatScoreResult {
    const breakdown: { [key: string]: number } = {};

    // AbuseIPDB confidence (0-100)
    const abuseConfidence = clamp(inputs.abuseData.abuseConfidenceScore ?? 0, 0, 100);
    breakdown['Abuse confidence'] = THREAT_SCORING.abuseWeight * (abuseConfidence / 100);

    // Known vulnerabilities on exposed services
    const vulnerabilityCount = Math.max(inputs.exposureData.vulnerabilityCount ?? 0, 0);
    breakdown['Exposed vulnerabilities'] =
      THREAT_SCORING.vulnerabilityWeight *
      (Math.min(vulnerabilityCount, THREAT_SCORING.vulnerabilityCap) / THREAT_SCORING.vulnerabilityCap);

    // Geographic base risk
    const countryCode = inputs.geoData.countryCode?.toUpperCase();
    if (this.homeCountry && countryCode === this.homeCountry) {
      breakdown[`Home country (${countryCode})`] = THREAT_SCORING.homeCountryBase;
    } else {
      breakdown[`Foreign or unknown country (${countryCode || 'unknown'})`] =
        THREAT_SCORING.foreignBase;
    }

    const total = Object.values(breakdown).reduce((sum, value) => sum + value, 0);

    return {
      threatScore: Math.min(total, THREAT_SCORING.maxScore),
      breakdown,
    };
  }

  /**
   * Build reasoning text
   */
  describe(result: ThreatScoreResult): string {
    const factors = Object.entries(result.breakdown)
      .filter(([, value]) => value > 0)
      .sort((a, b) => b[1] - a[1])
      .map(([factor, value]) => `${factor} (+${value.toFixed(2)})`)
      .join(', ');

    return `Threat score: ${result.threatScore.toFixed(2)}. Factors: ${factors}`;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
