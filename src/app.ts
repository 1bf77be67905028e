import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { MESSAGES } from './data/prompts';
import {
  crisisTypeForIntent,
  isSlotName,
  routeFallback,
} from './services';
import type { AssessmentService, SessionManager, SlotValidationService } from './services';
import { createLogger } from './utils/logger';

const logger = createLogger('CrisisApi');

const crisisTypeSchema = z.enum(['earthquake', 'flood', 'fire', 'power_outage', 'unknown']);

const intentBody = z.object({ intent: z.string().trim().min(1) });
const crisisTypeBody = z.object({ crisisType: crisisTypeSchema });
const formBody = z.object({
  activeForm: z.string().trim().min(1).nullable(),
  requestedSlot: z.string().trim().min(1).nullable().optional(),
});
const slotBody = z.object({
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]).optional(),
});

export interface AppDependencies {
  sessions: SessionManager;
  validator: SlotValidationService;
  assessments: AssessmentService;
}

function bodyErrorType(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return null;
}

function invalid(res: Response, error: z.ZodError): void {
  res.status(400).json({ error: 'invalid_request', details: error.flatten().fieldErrors });
}

export function createApp({ sessions, validator, assessments }: AppDependencies): express.Express {
  const app = express();
  app.disable('etag');
  app.disable('x-powered-by');
  app.use(express.json({ limit: '64kb' }));

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', sessions: sessions.size() });
  });

  app.get('/api/sessions/:sessionId', (req, res) => {
    const session = sessions.snapshot(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: 'session_not_found' });
      return;
    }
    res.status(200).json(session);
  });

  app.delete('/api/sessions/:sessionId', (req, res) => {
    const removed = sessions.end(req.params.sessionId);
    logger.info('Session ended', { sessionId: req.params.sessionId, removed });
    res.status(200).json({ ok: true });
  });

  app.post('/api/sessions/:sessionId/intent', (req, res) => {
    const parsed = intentBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      invalid(res, parsed.error);
      return;
    }

    const { sessionId } = req.params;
    const crisisType = crisisTypeForIntent(parsed.data.intent);
    if (crisisType) {
      sessions.setCrisisType(sessionId, crisisType);
      logger.info('Crisis type set from intent', { sessionId, intent: parsed.data.intent, crisisType });
    } else {
      sessions.upsert(sessionId);
    }

    res.status(200).json({ crisisType, session: sessions.snapshot(sessionId) });
  });

  app.post('/api/sessions/:sessionId/crisis-type', (req, res) => {
    const parsed = crisisTypeBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      invalid(res, parsed.error);
      return;
    }

    const { sessionId } = req.params;
    sessions.setCrisisType(sessionId, parsed.data.crisisType);
    logger.info('Crisis type set', { sessionId, crisisType: parsed.data.crisisType });
    res.status(200).json({ session: sessions.snapshot(sessionId) });
  });

  app.post('/api/sessions/:sessionId/greet', (req, res) => {
    sessions.upsert(req.params.sessionId);
    res.status(200).json({ message: MESSAGES.greet });
  });

  app.post('/api/sessions/:sessionId/restart', (req, res) => {
    const { sessionId } = req.params;
    sessions.restart(sessionId);
    logger.info('Session restarted', { sessionId });
    res.status(200).json({ message: MESSAGES.restart, session: sessions.snapshot(sessionId) });
  });

  app.post('/api/sessions/:sessionId/form', (req, res) => {
    const parsed = formBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      invalid(res, parsed.error);
      return;
    }

    const { sessionId } = req.params;
    sessions.setForm(sessionId, parsed.data.activeForm, parsed.data.requestedSlot ?? null);
    res.status(200).json({ session: sessions.snapshot(sessionId) });
  });

  app.post('/api/sessions/:sessionId/slots/:slot', async (req, res, next) => {
    const { sessionId, slot } = req.params;
    if (!isSlotName(slot)) {
      res.status(404).json({ error: 'unknown_slot', slot });
      return;
    }

    const parsed = slotBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      invalid(res, parsed.error);
      return;
    }

    try {
      const session = sessions.upsert(sessionId);
      const revision = sessions.revision(sessionId) ?? undefined;
      const decision = await validator.validate(slot, parsed.data.value, session);
      if (!sessions.applySlot(sessionId, slot, decision, revision)) {
        logger.warn('Dropped slot value for a session reset mid-request', { sessionId, slot });
        res.status(409).json({ error: 'session_changed' });
        return;
      }
      logger.debug('Slot validated', { sessionId, slot, accepted: decision.value !== null });

      res.status(200).json({
        accepted: decision.value !== null,
        value: decision.value,
        message: decision.message,
        session: sessions.snapshot(sessionId),
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/sessions/:sessionId/assessment', async (req, res, next) => {
    const { sessionId } = req.params;
    const session = sessions.get(sessionId);
    if (!session) {
      res.status(404).json({ error: 'session_not_found' });
      return;
    }

    try {
      const revision = sessions.revision(sessionId) ?? undefined;
      const result = await assessments.assess(session);
      if (!sessions.recordAssessment(sessionId, result, revision)) {
        logger.warn('Dropped assessment for a session reset mid-request', { sessionId });
        res.status(409).json({ error: 'session_changed' });
        return;
      }
      res.status(200).json({ ...result, session: sessions.snapshot(sessionId) });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/sessions/:sessionId/fallback', (req, res) => {
    const session = sessions.get(req.params.sessionId);
    const message = routeFallback({
      crisisType: session?.crisisType ?? null,
      activeForm: session?.activeForm ?? null,
      requestedSlot: session?.requestedSlot ?? null,
    });
    res.status(200).json({ message });
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    const type = bodyErrorType(error);
    if (type === 'entity.parse.failed') {
      res.status(400).json({ error: 'invalid_json' });
      return;
    }
    if (type === 'entity.too.large') {
      res.status(413).json({ error: 'payload_too_large' });
      return;
    }
    if (res.headersSent) {
      next(error);
      return;
    }

    logger.error('Unhandled request error', { error: String(error) });
    res.status(500).json({ error: 'internal_error' });
  });

  return app;
}
