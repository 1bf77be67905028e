import { CRISIS_INTENTS } from '../data/vocabulary';
import type {
  AssessmentResult,
  AssessmentSession,
  CrisisType,
  ResolvedLocation,
  SlotDecision,
  SlotName,
} from '../types';
import type { SlotValue } from './slotValidationService';

type CollectedFields = Omit<AssessmentSession, 'sessionId' | 'createdAt' | 'lastUpdatedAt' | 'crisisType' | 'activeForm' | 'requestedSlot'>;

function clearedFields(): CollectedFields {
  return {
    location: null,
    locationVerified: false,
    locationCoordinates: null,
    peopleCount: null,
    vulnerability: null,
    mobilityStatus: null,
    injuryStatus: null,
    riskScore: null,
    riskLevel: null,
    vulnerabilitySummary: null,
    shelterSuggestions: [],
  };
}

function isResolvedLocation(value: SlotValue | null): value is ResolvedLocation {
  return typeof value === 'object' && value !== null;
}

export function crisisTypeForIntent(intent: string): CrisisType | null {
  return Object.prototype.hasOwnProperty.call(CRISIS_INTENTS, intent) ? CRISIS_INTENTS[intent] : null;
}

export const DEFAULT_SESSION_IDLE_TTL_MS = 30 * 60 * 1000;

export interface SessionManagerOptions {
  idleTtlMs?: number;
}

/**
 * In-memory conversation state, one entry per session id. Nothing is shared
 * between sessions, and a session untouched for `idleTtlMs` is dropped on the
 * next access.
 *
 * Every session carries a revision that changes whenever its collected data is
 * wiped. Writers that awaited a provider pass the revision they started from;
 * a mismatch means the write is stale and it is dropped.
 */
export class SessionManager {
  private readonly sessions = new Map<string, AssessmentSession>();
  private readonly revisions = new Map<string, number>();
  private readonly idleTtlMs: number;
  private nextRevision = 1;

  constructor(options: SessionManagerOptions = {}) {
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_SESSION_IDLE_TTL_MS;
  }

  private evictIdle(): void {
    const cutoff = Date.now() - this.idleTtlMs;
    for (const [sessionId, session] of this.sessions) {
      if (session.lastUpdatedAt <= cutoff) {
        this.sessions.delete(sessionId);
        this.revisions.delete(sessionId);
      }
    }
  }

  private bumpRevision(sessionId: string): void {
    this.revisions.set(sessionId, this.nextRevision++);
  }

  private isCurrent(sessionId: string, expectedRevision: number | undefined): boolean {
    if (expectedRevision === undefined) return true;
    return this.revisions.get(sessionId) === expectedRevision;
  }

  upsert(sessionId: string): AssessmentSession {
    this.evictIdle();
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastUpdatedAt = Date.now();
      return existing;
    }

    const created: AssessmentSession = {
      sessionId,
      createdAt: Date.now(),
      lastUpdatedAt: Date.now(),
      crisisType: null,
      activeForm: null,
      requestedSlot: null,
      ...clearedFields(),
    };

    this.sessions.set(sessionId, created);
    this.bumpRevision(sessionId);
    return created;
  }

  get(sessionId: string): AssessmentSession | null {
    this.evictIdle();
    return this.sessions.get(sessionId) || null;
  }

  /** Revision of the session's collected data; `null` for unknown sessions. */
  revision(sessionId: string): number | null {
    this.evictIdle();
    return this.revisions.get(sessionId) ?? null;
  }

  snapshot(sessionId: string): AssessmentSession | null {
    this.evictIdle();
    const session = this.sessions.get(sessionId);
    if (!session) return null;
    return {
      ...session,
      locationCoordinates: session.locationCoordinates ? { ...session.locationCoordinates } : null,
      shelterSuggestions: [...session.shelterSuggestions],
    };
  }

  /** Always wipes what was collected, even when the type is unchanged. */
  setCrisisType(sessionId: string, crisisType: CrisisType): AssessmentSession {
    const session = this.upsert(sessionId);
    Object.assign(session, clearedFields(), { crisisType });
    this.bumpRevision(sessionId);
    return session;
  }

  clearSlots(sessionId: string): AssessmentSession {
    const session = this.upsert(sessionId);
    Object.assign(session, clearedFields(), { crisisType: null });
    this.bumpRevision(sessionId);
    return session;
  }

  restart(sessionId: string): AssessmentSession {
    const session = this.clearSlots(sessionId);
    session.activeForm = null;
    session.requestedSlot = null;
    return session;
  }

  setForm(sessionId: string, activeForm: string | null, requestedSlot: string | null): AssessmentSession {
    const session = this.upsert(sessionId);
    session.activeForm = activeForm;
    session.requestedSlot = activeForm ? requestedSlot : null;
    return session;
  }

  /**
   * A rejected decision leaves the slot unset, discarding any earlier value.
   * Returns `null`, writing nothing, when `expectedRevision` is stale.
   */
  applySlot(
    sessionId: string,
    slot: SlotName,
    decision: SlotDecision<SlotValue>,
    expectedRevision?: number,
  ): AssessmentSession | null {
    if (!this.isCurrent(sessionId, expectedRevision)) return null;
    const session = this.upsert(sessionId);
    const { value } = decision;

    switch (slot) {
      case 'location':
        if (isResolvedLocation(value)) {
          session.location = value.name;
          session.locationVerified = value.verified;
          session.locationCoordinates = value.coordinates ? { ...value.coordinates } : null;
        } else {
          session.location = null;
          session.locationVerified = false;
          session.locationCoordinates = null;
        }
        break;
      case 'people_count':
        session.peopleCount = typeof value === 'string' ? value : null;
        break;
      case 'vulnerability':
        session.vulnerability = typeof value === 'string' ? value : null;
        break;
      case 'mobility_status':
        session.mobilityStatus = typeof value === 'string' ? value : null;
        break;
      case 'injury_status':
        session.injuryStatus = typeof value === 'string' ? value : null;
        break;
    }

    return session;
  }

  recordAssessment(sessionId: string, result: AssessmentResult, expectedRevision?: number): AssessmentSession | null {
    if (!this.isCurrent(sessionId, expectedRevision)) return null;
    const session = this.upsert(sessionId);
    session.riskScore = result.riskScore;
    session.riskLevel = result.riskLevel;
    session.vulnerabilitySummary = result.vulnerabilitySummary;
    session.shelterSuggestions = [...result.shelters];
    return session;
  }

  end(sessionId: string): boolean {
    this.revisions.delete(sessionId);
    return this.sessions.delete(sessionId);
  }

  size(): number {
    this.evictIdle();
    return this.sessions.size;
  }
}
