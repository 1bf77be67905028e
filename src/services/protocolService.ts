import { DISCLAIMER, PROTOCOL_ADDENDA, SAFETY_PROTOCOLS } from '../data/prompts';
import { INJURY_SYNONYMS, MOBILITY_SYNONYMS } from '../data/vocabulary';
import type { CrisisType, RiskLevel } from '../types';

export interface ProtocolInput {
  crisisType: CrisisType | null;
  riskLevel: RiskLevel | null;
  mobilityStatus: string | null;
  injuryStatus: string | null;
}

function emergencyHeader(level: RiskLevel): string {
  if (level === 'CRITICAL' || level === 'HIGH') {
    return `🚨 ${level} RISK SITUATION 🚨\n\n⚠️ STRONGLY RECOMMEND CALLING EMERGENCY SERVICES: 112/911\n\n`;
  }
  return `ℹ️ ${level} Risk Assessment\n\n`;
}

const RESTRICTED_WORDS = new Set(['no', "can't", 'cannot']);

// Answers kept verbatim ("no way out", "yes, a cut") are read word by word.
function words(status: string): string[] {
  return status.replace(/\u2019/g, "'").split(/[^\p{L}']+/u).filter(Boolean);
}

function mobilityAddendum(status: string): string | null {
  if (MOBILITY_SYNONYMS.no.has(status)) return PROTOCOL_ADDENDA.mobilityRestricted;
  if (MOBILITY_SYNONYMS.yes.has(status)) return PROTOCOL_ADDENDA.mobilityConfirmed;
  if (MOBILITY_SYNONYMS.unsure.has(status)) return null;

  const said = words(status);
  if (said.some((word) => RESTRICTED_WORDS.has(word))) return PROTOCOL_ADDENDA.mobilityRestricted;
  if (said.includes('yes')) return PROTOCOL_ADDENDA.mobilityConfirmed;
  return null;
}

function injuryAddendum(status: string): string | null {
  if (INJURY_SYNONYMS.yes.has(status)) return PROTOCOL_ADDENDA.injuriesReported;
  if (INJURY_SYNONYMS.no.has(status)) return PROTOCOL_ADDENDA.noInjuries;
  if (INJURY_SYNONYMS.unsure.has(status)) return null;

  const said = words(status);
  if (said.includes('yes')) return PROTOCOL_ADDENDA.injuriesReported;
  if (said.includes('no')) return PROTOCOL_ADDENDA.noInjuries;
  return null;
}

export class ProtocolService {
  compose(input: ProtocolInput): string {
    const level = input.riskLevel || 'MEDIUM';
    const sections = [SAFETY_PROTOCOLS[input.crisisType || 'unknown']];

    const mobility = mobilityAddendum((input.mobilityStatus || '').toLowerCase().trim());
    if (mobility) sections.push(mobility);

    const injury = injuryAddendum((input.injuryStatus || '').toLowerCase().trim());
    if (injury) sections.push(injury);

    sections.push(`ℹ️ ${DISCLAIMER}`);

    return emergencyHeader(level) + sections.join('\n\n');
  }
}
