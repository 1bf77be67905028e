export type CrisisType = 'earthquake' | 'flood' | 'fire' | 'power_outage' | 'unknown';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export type StatusAnswer = 'yes' | 'no' | 'unsure';

export type SlotName = 'location' | 'people_count' | 'vulnerability' | 'mobility_status' | 'injury_status';

/** Whatever the dialogue engine extracted for a slot, before validation. */
export type RawSlotValue = string | number | boolean | null | undefined;

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export type ResolvedLocation =
  | { name: string; verified: true; coordinates: Coordinates }
  | { name: string; verified: false; coordinates: null };

export interface SlotDecision<T> {
  /** `null` means the candidate was rejected or absent and the slot stays unset. */
  value: T | null;
  message: string | null;
}

export interface VulnerabilityCounts {
  children: number;
  elderly: number;
  pregnant: number;
  medicalNeeds: number;
}

export interface GeocodeMatch {
  displayName: string;
  latitude: number;
  longitude: number;
}

export interface AssessmentSession {
  sessionId: string;
  createdAt: number;
  lastUpdatedAt: number;
  crisisType: CrisisType | null;
  location: string | null;
  locationVerified: boolean;
  locationCoordinates: Coordinates | null;
  peopleCount: string | null;
  vulnerability: string | null;
  mobilityStatus: string | null;
  injuryStatus: string | null;
  riskScore: number | null;
  riskLevel: RiskLevel | null;
  vulnerabilitySummary: string | null;
  shelterSuggestions: string[];
  activeForm: string | null;
  requestedSlot: string | null;
}

export interface RiskScoreInput {
  crisisType: CrisisType | null;
  peopleCount: string | null;
  vulnerability: string | null;
  mobilityStatus: string | null;
  injuryStatus: string | null;
}

export interface RiskScore {
  score: number;
  level: RiskLevel;
  counts: VulnerabilityCounts;
  totalVulnerable: number;
}

export interface AssessmentResult {
  riskScore: number;
  riskLevel: RiskLevel;
  vulnerabilitySummary: string;
  shelters: string[];
  summary: string;
  protocol: string;
}

export interface FallbackContext {
  crisisType: CrisisType | null;
  activeForm: string | null;
  requestedSlot: string | null;
}

export interface AppConfig {
  port: number;
  nominatimBaseUrl: string;
  nominatimContactEmail: string;
  nominatimUserAgent: string;
  nominatimTimeoutMs: number;
  /** Pause before every provider request; never below 100ms. */
  nominatimPauseMs: number;
  shelterRadiusKm: number;
  shelterLimit: number;
  sessionIdleTtlMs: number;
}
