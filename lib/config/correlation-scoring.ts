import type { CorrelationPattern } from '../../src/shared/types';

export const CORRELATION_SCORING = {
  // Pairs scoring above this (exclusive) are persisted
  acceptanceThreshold: 0.5,

  // Temporal term: linear decay to zero over the window
  temporal: {
    weight: 0.3,
    windowSeconds: 86_400,
  },

  // Spatial term: linear decay to zero over the radius
  spatial: {
    weight: 0.4,
    radiusKm: 10,
  },

  // Each matching pattern adds pattern.weight * multiplier (additive, no cap of its own)
  pattern: {
    multiplier: 0.3,
  },

  maxScore: 1.0,
} as const;

export const THREAT_SCORING = {
  abuseWeight: 0.6,
  vulnerabilityWeight: 0.3,
  vulnerabilityCap: 20,
  homeCountryBase: 0.05,
  foreignBase: 0.1,
  maxScore: 1.0,
} as const;

export const DEFAULT_CORRELATION_PATTERNS: CorrelationPattern[] = [
  {
    name: 'sim_swap_fraud',
    cyberIndicators: ['sim_swap', 'account_takeover', 'unauthorized_transactions'],
    physicalIndicators: ['phone_theft', 'identity_theft', 'card_fraud'],
    weight: 0.8,
  },
  {
    name: 'card_fraud',
    cyberIndicators: ['card_not_present', 'online_fraud', 'data_breach'],
    physicalIndicators: ['card_theft', 'atm_skimming', 'pos_fraud'],
    weight: 0.7,
  },
  {
    name: 'identity_theft',
    cyberIndicators: ['phishing', 'social_engineering', 'data_breach'],
    physicalIndicators: ['document_theft', 'mail_theft', 'dumpster_diving', 'cyber_fraud'],
    weight: 0.6,
  },
];
