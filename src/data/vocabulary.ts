import type { CrisisType, StatusAnswer } from '../types';

/** Membership-only view over a fixed word list; the backing set never escapes. */
export interface WordList {
  has(word: string): boolean;
}

function wordList(values: readonly string[]): WordList {
  const words = new Set(values);
  return Object.freeze({ has: (word: string): boolean => words.has(word) });
}

export const VAGUE_LOCATIONS = wordList([
  'home', 'house', 'apartment', 'work', 'office', 'school', 'here', 'inside', 'outside',
  'not sure', 'dont know', "don't know", 'unsure', 'somewhere', 'around', 'nearby',
  'close', 'far', 'there', 'this place', 'my place', 'upstairs', 'downstairs',
  'room', 'building', 'car', 'vehicle',
]);

// Accepted unverified when the provider is unreachable.
export const KNOWN_CITIES = wordList([
  'berlin', 'munich', 'muenchen', 'hamburg', 'frankfurt', 'frankfurt am main',
  'cologne', 'koeln', 'düsseldorf', 'dusseldorf', 'stuttgart', 'leipzig',
  'bremen', 'dresden', 'hannover', 'nuremberg', 'nürnberg', 'nurnberg',
]);

export const FILLER_WORDS = wordList(['hi', 'hello', 'hey', 'restart', 'help', 'what', 'when', 'where']);

export const MOBILITY_SYNONYMS: Readonly<Record<StatusAnswer, WordList>> = Object.freeze({
  yes: wordList(['yes', 'yeah', 'y', 'can move', 'able to move']),
  no: wordList(['no', 'n', 'cannot move', "can't move", 'unable', 'stuck', 'trapped']),
  unsure: wordList(['unsure', 'not sure', 'dont know', "don't know", 'maybe', 'uncertain']),
});

export const INJURY_SYNONYMS: Readonly<Record<StatusAnswer, WordList>> = Object.freeze({
  yes: wordList(['yes', 'y', 'injured', 'hurt', 'bleeding', 'wounded']),
  no: wordList(['no', 'n', 'none', 'not injured', 'fine', 'ok', 'okay']),
  unsure: wordList(['unsure', 'not sure', 'dont know', "don't know", 'maybe', 'unclear']),
});

/** Stored mobility/injury answers the scorer penalises, matched exactly. */
export const SCORED_MOBILITY = Object.freeze({
  cannotMove: wordList(['no', "can't move", 'cannot move', 'stuck', 'unable', 'trapped']),
  unsure: wordList(['unsure', 'not sure', 'maybe', 'uncertain']),
});

export const SCORED_INJURY = Object.freeze({
  injured: wordList(['yes', 'injured', 'hurt', 'bleeding', 'wounded']),
  unsure: wordList(['unsure', 'not sure', 'maybe', 'unclear']),
});

export const VULNERABILITY_KEYWORDS = Object.freeze({
  children: Object.freeze(['child', 'kid', 'baby', 'infant', 'children', 'kids']),
  elderly: Object.freeze(['elderly', 'old', 'senior', 'grandparent']),
  pregnant: Object.freeze(['pregnant', 'expecting']),
  medicalNeeds: Object.freeze(['medical', 'disability', 'disabled', 'sick', 'asthma']),
});

export const CRISIS_BASE_WEIGHT: Readonly<Record<CrisisType, number>> = Object.freeze({
  earthquake: 30,
  fire: 30,
  flood: 25,
  power_outage: 15,
  unknown: 20,
});

export const CRISIS_INTENTS: Readonly<Record<string, CrisisType>> = Object.freeze({
  report_earthquake: 'earthquake',
  report_flood: 'flood',
  report_fire: 'fire',
  report_power_outage: 'power_outage',
});

export const SHELTER_QUERIES = Object.freeze([
  'emergency shelter',
  'evacuation center',
  'community center',
  'shelter',
]);
