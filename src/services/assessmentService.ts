import { MESSAGES } from '../data/prompts';
import type { AssessmentResult, AssessmentSession, RiskLevel } from '../types';
import { createLogger } from '../utils/logger';
import { ProtocolService } from './protocolService';
import { RISK_BANDS, RiskScoringService, parsePeopleCount } from './riskScoringService';
import type { ShelterFinder } from './shelterService';
import { DEFAULT_SHELTER_LIMIT, DEFAULT_SHELTER_RADIUS_KM } from './shelterService';
import { summarizeVulnerabilities } from './vulnerabilityExtractor';

const logger = createLogger('Assessment');

export interface AssessmentOptions {
  shelterRadiusKm: number;
  shelterLimit: number;
}

export type AssessmentInput = Readonly<Pick<
  AssessmentSession,
  | 'sessionId'
  | 'crisisType'
  | 'location'
  | 'locationVerified'
  | 'locationCoordinates'
  | 'peopleCount'
  | 'vulnerability'
  | 'mobilityStatus'
  | 'injuryStatus'
>>;

const BAND_LEGEND = RISK_BANDS.map((band) => `• ${band.min}-${band.max}: ${band.level}`).join(' ');

export function formatShelters(shelters: string[]): string {
  if (shelters.length === 0) return MESSAGES.sheltersNotFound;
  return [MESSAGES.sheltersHeader, ...shelters.map((name) => `- ${name}`)].join('\n');
}

interface SummaryFields {
  crisisType: string;
  location: string | null;
  people: number;
  vulnerabilitySummary: string;
  mobility: string;
  injury: string;
  score: number;
  level: RiskLevel;
  shelters: string[];
}

export function formatAssessmentSummary(fields: SummaryFields): string {
  return [
    '📋 CRISIS ASSESSMENT COMPLETE:',
    `Crisis Type: ${fields.crisisType} | Location: ${fields.location ?? 'None'} | People: ${fields.people}`,
    `Vulnerabilities: ${fields.vulnerabilitySummary} | Mobility: ${fields.mobility} | Injuries: ${fields.injury}`,
    '',
    `🎯 RISK LEVEL: ${fields.level} | 📊 Risk Score: ${fields.score}/100`,
    `📋 Risk Levels: ${BAND_LEGEND}`,
    '',
    formatShelters(fields.shelters),
    '',
  ].join('\n');
}

export class AssessmentService {
  private readonly scoring = new RiskScoringService();
  private readonly protocols = new ProtocolService();

  constructor(
    private readonly shelters: ShelterFinder,
    private readonly options: AssessmentOptions = {
      shelterRadiusKm: DEFAULT_SHELTER_RADIUS_KM,
      shelterLimit: DEFAULT_SHELTER_LIMIT,
    },
  ) {}

  async assess(session: AssessmentInput): Promise<AssessmentResult> {
    const risk = this.scoring.score(session);
    const vulnerabilitySummary = summarizeVulnerabilities(risk.counts);

    let shelters: string[] = [];
    if (session.locationVerified && session.locationCoordinates) {
      shelters = await this.shelters.findShelters(
        session.locationCoordinates,
        this.options.shelterRadiusKm,
        this.options.shelterLimit,
      );
    }

    logger.info('Assessment complete', {
      sessionId: session.sessionId,
      score: risk.score,
      level: risk.level,
      shelters: shelters.length,
    });

    const mobility = (session.mobilityStatus || '').toLowerCase().trim();
    const injury = (session.injuryStatus || '').toLowerCase().trim();

    return {
      riskScore: risk.score,
      riskLevel: risk.level,
      vulnerabilitySummary,
      shelters,
      summary: formatAssessmentSummary({
        crisisType: session.crisisType || 'unknown',
        location: session.location,
        people: parsePeopleCount(session.peopleCount),
        vulnerabilitySummary,
        mobility,
        injury,
        score: risk.score,
        level: risk.level,
        shelters,
      }),
      protocol: this.protocols.compose({
        crisisType: session.crisisType,
        riskLevel: risk.level,
        mobilityStatus: session.mobilityStatus,
        injuryStatus: session.injuryStatus,
      }),
    };
  }
}
