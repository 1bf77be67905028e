import {
  MESSAGES,
  incompleteLocationMessage,
  vagueLocationMessage,
} from '../data/prompts';
import {
  FILLER_WORDS,
  INJURY_SYNONYMS,
  KNOWN_CITIES,
  MOBILITY_SYNONYMS,
  VAGUE_LOCATIONS,
} from '../data/vocabulary';
import type { WordList } from '../data/vocabulary';
import type {
  AssessmentSession,
  RawSlotValue,
  ResolvedLocation,
  SlotDecision,
  SlotName,
  StatusAnswer,
} from '../types';
import { createLogger } from '../utils/logger';
import type { Geocoder } from './geocodingService';

const logger = createLogger('SlotValidation');

const MIN_LOCATION_LENGTH = 4;

type SessionView = Readonly<Pick<AssessmentSession, 'sessionId'>>;

type StatusMessages = Record<StatusAnswer, string> & { reask: string };

export type SlotValue = ResolvedLocation | string;

function toText(value: RawSlotValue): string {
  if (value === null || value === undefined || value === false) return '';
  return String(value).trim();
}

function accept<T>(value: T, message: string | null = null): SlotDecision<T> {
  return { value, message };
}

function reject<T>(message: string | null = null): SlotDecision<T> {
  return { value: null, message };
}

/** "frankfurt am main" -> "Frankfurt Am Main"; every run of letters gets an upper-case initial. */
export function titleCase(input: string): string {
  return input.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function mapStatus(
  raw: string,
  synonyms: Readonly<Record<StatusAnswer, WordList>>,
  messages: StatusMessages,
): SlotDecision<string> {
  const normalized = raw.toLowerCase();
  if (FILLER_WORDS.has(normalized)) return reject(messages.reask);

  const answers: StatusAnswer[] = ['yes', 'no', 'unsure'];
  for (const answer of answers) {
    if (synonyms[answer].has(normalized)) {
      return accept(answer, messages[answer]);
    }
  }

  // Unmapped answers are kept as typed so the form never stalls.
  return accept(raw);
}

export class SlotValidationService {
  constructor(private readonly geocoder: Geocoder) {}

  async validateLocation(value: RawSlotValue, session: SessionView): Promise<SlotDecision<ResolvedLocation>> {
    const raw = toText(value);
    if (!raw) return reject(MESSAGES.noLocation);

    const normalized = raw.toLowerCase();
    if (VAGUE_LOCATIONS.has(normalized)) {
      return reject(vagueLocationMessage(raw));
    }

    // Code points, not UTF-16 units.
    if (/^\d+$/.test(normalized) || Array.from(normalized).length < MIN_LOCATION_LENGTH) {
      return reject(incompleteLocationMessage(raw));
    }

    const match = await this.geocoder.geocode(raw);
    if (match) {
      logger.info('Location verified', { sessionId: session.sessionId, location: match.displayName });
      return accept<ResolvedLocation>({
        name: match.displayName,
        verified: true,
        coordinates: { latitude: match.latitude, longitude: match.longitude },
      });
    }

    if (KNOWN_CITIES.has(normalized)) {
      return accept<ResolvedLocation>({ name: titleCase(raw), verified: false, coordinates: null });
    }

    logger.info('Location accepted unverified', { sessionId: session.sessionId });
    return accept<ResolvedLocation>({ name: raw, verified: false, coordinates: null }, MESSAGES.unverifiedLocation);
  }

  validatePeopleCount(value: RawSlotValue, _session: SessionView): SlotDecision<string> {
    const raw = toText(value);
    if (!raw) return reject();

    const match = /^([+-]?)(\d+)$/.exec(raw);
    if (!match) return reject(MESSAGES.peopleNotNumber);

    // Kept as a digit string; counts past 2^53 keep every digit.
    const digits = match[2].replace(/^0+/, '');
    if (!digits || match[1] === '-') return reject(MESSAGES.peopleNotPositive);

    return accept(digits);
  }

  validateVulnerability(value: RawSlotValue, _session: SessionView): SlotDecision<string> {
    const raw = toText(value);
    if (!raw) return reject();

    // Guards against the dialogue engine routing a greeting into this slot.
    if (FILLER_WORDS.has(raw.toLowerCase())) return reject(MESSAGES.reaskVulnerability);

    return accept(raw);
  }

  validateMobilityStatus(value: RawSlotValue, _session: SessionView): SlotDecision<string> {
    const raw = toText(value);
    if (!raw) return reject();

    return mapStatus(raw, MOBILITY_SYNONYMS, {
      yes: MESSAGES.mobilityYes,
      no: MESSAGES.mobilityNo,
      unsure: MESSAGES.mobilityUnsure,
      reask: MESSAGES.reaskMobility,
    });
  }

  validateInjuryStatus(value: RawSlotValue, _session: SessionView): SlotDecision<string> {
    const raw = toText(value);
    if (!raw) return reject();

    return mapStatus(raw, INJURY_SYNONYMS, {
      yes: MESSAGES.injuryYes,
      no: MESSAGES.injuryNo,
      unsure: MESSAGES.injuryUnsure,
      reask: MESSAGES.reaskInjury,
    });
  }

  async validate(slot: SlotName, value: RawSlotValue, session: SessionView): Promise<SlotDecision<SlotValue>> {
    switch (slot) {
      case 'location':
        return this.validateLocation(value, session);
      case 'people_count':
        return this.validatePeopleCount(value, session);
      case 'vulnerability':
        return this.validateVulnerability(value, session);
      case 'mobility_status':
        return this.validateMobilityStatus(value, session);
      case 'injury_status':
        return this.validateInjuryStatus(value, session);
    }
  }
}
