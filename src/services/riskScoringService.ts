import { CRISIS_BASE_WEIGHT, SCORED_INJURY, SCORED_MOBILITY } from '../data/vocabulary';
import type { RiskLevel, RiskScore, RiskScoreInput } from '../types';
import { extractVulnerabilities, totalVulnerable } from './vulnerabilityExtractor';

export const MAX_RISK_SCORE = 100;
const PER_PERSON_WEIGHT = 15;

export const RISK_BANDS: ReadonlyArray<{ level: RiskLevel; min: number; max: number }> = [
  { level: 'LOW', min: 0, max: 25 },
  { level: 'MEDIUM', min: 26, max: 50 },
  { level: 'HIGH', min: 51, max: 75 },
  { level: 'CRITICAL', min: 76, max: 100 },
];

export function riskLevelFor(score: number): RiskLevel {
  if (score >= 76) return 'CRITICAL';
  if (score >= 51) return 'HIGH';
  if (score >= 26) return 'MEDIUM';
  return 'LOW';
}

/** Defaults to 1 when absent or unreadable; oversized counts saturate at MAX_SAFE_INTEGER. */
export function parsePeopleCount(raw: string | null): number {
  const count = Number.parseInt((raw || '').trim(), 10);
  if (Number.isNaN(count) || count <= 0) return 1;
  return Math.min(count, Number.MAX_SAFE_INTEGER);
}

function groupWeight(people: number): number {
  if (people >= 5) return 20;
  if (people >= 3) return 10;
  if (people === 2) return 5;
  return 0;
}

// Stacks on top of the per-person weight.
function clusterBonus(total: number): number {
  if (total >= 3) return 15;
  if (total >= 2) return 10;
  return 0;
}

function mobilityPenalty(status: string): number {
  if (SCORED_MOBILITY.cannotMove.has(status)) return 20;
  if (SCORED_MOBILITY.unsure.has(status)) return 10;
  return 0;
}

function injuryPenalty(status: string): number {
  if (SCORED_INJURY.injured.has(status)) return 25;
  if (SCORED_INJURY.unsure.has(status)) return 10;
  return 0;
}

function normalizeStatus(status: string | null): string {
  return (status || '').toLowerCase().trim();
}

export class RiskScoringService {
  score(input: RiskScoreInput): RiskScore {
    const counts = extractVulnerabilities(input.vulnerability);
    const total = totalVulnerable(counts);

    const raw = CRISIS_BASE_WEIGHT[input.crisisType || 'unknown']
      + groupWeight(parsePeopleCount(input.peopleCount))
      + total * PER_PERSON_WEIGHT
      + clusterBonus(total)
      + mobilityPenalty(normalizeStatus(input.mobilityStatus))
      + injuryPenalty(normalizeStatus(input.injuryStatus));

    const score = Math.max(0, Math.min(raw, MAX_RISK_SCORE));

    return {
      score,
      level: riskLevelFor(score),
      counts,
      totalVulnerable: total,
    };
  }
}
