import { createApp } from './app';
import { getConfig } from './config';
import {
  AssessmentService,
  GeocodingService,
  NominatimClient,
  SessionManager,
  ShelterService,
  SlotValidationService,
} from './services';
import { createLogger } from './utils/logger';

const config = getConfig();
const logger = createLogger('CrisisAssessment');

const nominatim = new NominatimClient({
  baseUrl: config.nominatimBaseUrl,
  contactEmail: config.nominatimContactEmail,
  userAgent: config.nominatimUserAgent,
  timeoutMs: config.nominatimTimeoutMs,
  pauseMs: config.nominatimPauseMs,
});

const app = createApp({
  sessions: new SessionManager({ idleTtlMs: config.sessionIdleTtlMs }),
  validator: new SlotValidationService(new GeocodingService(nominatim)),
  assessments: new AssessmentService(new ShelterService(nominatim), {
    shelterRadiusKm: config.shelterRadiusKm,
    shelterLimit: config.shelterLimit,
  }),
});

app.listen(config.port, () => {
  logger.info('Crisis assessment service listening', {
    port: config.port,
    provider: config.nominatimBaseUrl,
    shelterRadiusKm: config.shelterRadiusKm,
  });
});
