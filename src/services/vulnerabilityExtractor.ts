import { VULNERABILITY_KEYWORDS } from '../data/vocabulary';
import type { VulnerabilityCounts } from '../types';

type Category = keyof VulnerabilityCounts;

const CATEGORIES: Category[] = ['children', 'elderly', 'pregnant', 'medicalNeeds'];

const NUMBERED_PATTERNS: Record<Category, RegExp> = {
  children: numberedPattern(VULNERABILITY_KEYWORDS.children),
  elderly: numberedPattern(VULNERABILITY_KEYWORDS.elderly),
  pregnant: numberedPattern(VULNERABILITY_KEYWORDS.pregnant),
  medicalNeeds: numberedPattern(VULNERABILITY_KEYWORDS.medicalNeeds),
};

const SUMMARY_LABELS: Record<Category, string> = {
  children: 'children',
  elderly: 'elderly',
  pregnant: 'pregnant',
  medicalNeeds: 'medical needs',
};

function numberedPattern(keywords: readonly string[]): RegExp {
  return new RegExp(`(\\d+)\\s*(?:${keywords.join('|')})`, 'g');
}

function toCount(digits: string): number {
  return Math.min(Number.parseInt(digits, 10), Number.MAX_SAFE_INTEGER);
}

function countCategory(text: string, category: Category): number {
  const numbers = Array.from(text.matchAll(NUMBERED_PATTERNS[category]), (match) => toCount(match[1]));
  if (numbers.length > 0) {
    return Math.min(numbers.reduce((sum, value) => sum + value, 0), Number.MAX_SAFE_INTEGER);
  }
  // A bare keyword means at least one. Substring match, so "no children" still counts.
  return VULNERABILITY_KEYWORDS[category].some((keyword) => text.includes(keyword)) ? 1 : 0;
}

export function emptyCounts(): VulnerabilityCounts {
  return { children: 0, elderly: 0, pregnant: 0, medicalNeeds: 0 };
}

export function extractVulnerabilities(text: string | null | undefined): VulnerabilityCounts {
  const normalized = (text || '').toLowerCase();
  if (!normalized.trim()) return emptyCounts();

  const counts = emptyCounts();
  for (const category of CATEGORIES) {
    counts[category] = countCategory(normalized, category);
  }
  return counts;
}

export function totalVulnerable(counts: VulnerabilityCounts): number {
  return Math.min(CATEGORIES.reduce((sum, category) => sum + counts[category], 0), Number.MAX_SAFE_INTEGER);
}

/** e.g. `2 children, 1 elderly (3 vulnerable individuals)`, or `none`. */
export function summarizeVulnerabilities(counts: VulnerabilityCounts): string {
  const details = CATEGORIES
    .filter((category) => counts[category] > 0)
    .map((category) => `${counts[category]} ${SUMMARY_LABELS[category]}`);

  if (details.length === 0) return 'none';
  return `${details.join(', ')} (${totalVulnerable(counts)} vulnerable individuals)`;
}
