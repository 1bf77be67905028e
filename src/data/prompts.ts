import type { CrisisType, SlotName } from '../types';

export const LOCATION_EXAMPLE = "(e.g., 'Berlin, Alexanderplatz')";

export const SLOT_QUESTIONS: Record<SlotName, string> = {
  location: `📍 What is your current location? Please give City + nearby landmark ${LOCATION_EXAMPLE}.`,
  people_count: '👥 How many people are with you, including yourself?',
  vulnerability: 'Are there any vulnerable people with you? (children / elderly / pregnant / medical needs / none)',
  mobility_status: 'Can you move to a safer place? (yes / no / unsure)',
  injury_status: 'Are you or anyone with you injured? (yes / no / unsure)',
};

export const MESSAGES = {
  greet: "Hi! I'm the Crisis Response Assistant. If this is life-threatening, call your local emergency number now. Type: emergency to begin.",
  restart: "🔄 Chat restarted. Hi! I'm the Crisis Response Assistant. If this is life-threatening, call your local emergency number now. Type: emergency to begin.",
  notUnderstood: "I didn't understand that. If this is an emergency, type: emergency",
  answerCurrentQuestion: "I didn't understand. Please answer the current question so I can continue the assessment.",
  offerMoreSteps: 'What would you like to do next? (emergency services / safety guide / info only / restart)',
  noLocation: `Please tell me where you are: City + Landmark ${LOCATION_EXAMPLE}.`,
  unverifiedLocation: `📍 I could not verify that location on the map. Please add a landmark/street ${LOCATION_EXAMPLE}.`,
  peopleNotNumber: 'Please provide a number (e.g., 1, 2, 3).',
  peopleNotPositive: 'Please provide a number greater than 0.',
  reaskVulnerability: 'Please answer: Any vulnerable people? (children / elderly / pregnant / medical needs / none)',
  reaskMobility: 'Please answer: Can you move to a safer place? (yes / no / unsure)',
  reaskInjury: 'Please answer: Are you or anyone with you injured? (yes / no / unsure)',
  mobilityYes: '✅ Good! Move to a safer place now if possible. Then we continue.',
  mobilityNo: '🛑 Stay where you are. Do NOT attempt to move if unsafe.',
  mobilityUnsure: '⚠️ Only move if you are sure it is safer. When in doubt, stay put.',
  injuryYes: '🚑 Injuries reported. Do NOT move injured persons unless immediate danger.',
  injuryNo: '✅ No injuries reported. Continuing assessment.',
  injuryUnsure: '🔍 Check injuries carefully (bleeding, breathing, consciousness).',
  sheltersHeader: '🏠 Nearby shelter / safe places (approx):',
  sheltersNotFound: '🏠 Nearby shelters: Not found automatically (try adding a more specific landmark).',
} as const;

export function vagueLocationMessage(raw: string): string {
  return `'${raw}' is too vague. Please provide: City + Landmark ${LOCATION_EXAMPLE}.`;
}

export function incompleteLocationMessage(raw: string): string {
  return `'${raw}' seems incomplete. Please provide full location (City + Landmark).`;
}

export const SAFETY_PROTOCOLS: Record<CrisisType, string> = {
  earthquake: [
    '🏠 EARTHQUAKE SAFETY PROTOCOL:',
    '1) DROP, COVER, HOLD ON - Get under sturdy furniture',
    '2) Stay away from windows and heavy objects',
    '3) If outdoors, move away from buildings',
    '4) After shaking stops, check for injuries and hazards',
    '5) Expect aftershocks - be prepared to Drop/Cover/Hold again',
    '6) Evacuate if building shows structural damage',
  ].join('\n'),
  flood: [
    '🌊 FLOOD SAFETY PROTOCOL:',
    '1) Move to highest ground immediately',
    '2) NEVER walk through moving water',
    '3) Turn off electricity if safe',
    '4) Avoid driving through flood water',
    '5) Listen to evacuation orders',
    '6) Stay away from storm drains',
  ].join('\n'),
  fire: [
    '🔥 FIRE SAFETY PROTOCOL:',
    '1) GET OUT IMMEDIATELY if you see flames or heavy smoke',
    '2) Crawl low under smoke',
    '3) Feel doors before opening',
    '4) NEVER use elevators',
    '5) Once outside, stay outside and call emergency services',
    '6) If trapped, seal cracks and signal for help',
  ].join('\n'),
  power_outage: [
    '⚡ POWER OUTAGE SAFETY PROTOCOL:',
    '1) Use flashlights only',
    '2) Keep refrigerator/freezer closed',
    '3) Disconnect appliances to prevent surge damage',
    '4) Stay away from downed power lines',
    '5) If you rely on medical equipment, contact emergency services',
    '6) Use generators outside only',
  ].join('\n'),
  unknown: '📋 General emergency protocol: If life-threatening, call emergency services immediately.',
};

export const PROTOCOL_ADDENDA = {
  mobilityRestricted: '🛑 MOBILITY RESTRICTION: Stay in place. Help is coming to you.',
  mobilityConfirmed: '✅ MOBILITY CONFIRMED: Follow evacuation procedures if needed.',
  injuriesReported: '🚑 INJURIES REPORTED: Do not move injured persons unless immediate danger.',
  noInjuries: '✅ NO INJURIES: Continue standard protocols.',
} as const;

export const DISCLAIMER = 'Informational support only; not a medical or official emergency assessment.';
