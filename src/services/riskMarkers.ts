import type { RiskLevel } from '../types';

export interface RiskMarkers {
  level: RiskLevel | null;
  score: number | null;
}

const LEVELS: RiskLevel[] = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'];

/**
 * Reads the `RISK LEVEL: <X>` and `Risk Score: <n>/100` markers back out of
 * an assessment message, the way chat renderers pick them up for display.
 */
export function parseRiskMarkers(text: string): RiskMarkers | null {
  const upper = text.toUpperCase();
  if (!upper.includes('RISK')) return null;

  const level = LEVELS.find((candidate) => upper.includes(`RISK LEVEL: ${candidate}`)) ?? null;

  const match = /Risk Score:\s*(\d+)\/100/i.exec(text);
  const score = match ? Number.parseInt(match[1], 10) : null;

  if (level === null && score === null) return null;
  return { level, score };
}
