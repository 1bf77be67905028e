export { NominatimClient } from './nominatimClient';
export type { HttpGet, HttpResponse, NominatimOptions, NominatimPlace } from './nominatimClient';
export { GeocodingService } from './geocodingService';
export type { Geocoder } from './geocodingService';
export { ShelterService, viewboxAround } from './shelterService';
export type { ShelterFinder } from './shelterService';
export { SlotValidationService, titleCase } from './slotValidationService';
export type { SlotValue } from './slotValidationService';
export { extractVulnerabilities, summarizeVulnerabilities, totalVulnerable } from './vulnerabilityExtractor';
export { RiskScoringService, riskLevelFor, RISK_BANDS } from './riskScoringService';
export { ProtocolService } from './protocolService';
export { AssessmentService, formatAssessmentSummary } from './assessmentService';
export { routeFallback, isSlotName } from './fallbackRouter';
export { parseRiskMarkers } from './riskMarkers';
export { SessionManager, crisisTypeForIntent } from './sessionManager';
