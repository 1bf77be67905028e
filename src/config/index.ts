import fs from 'fs';
import path from 'path';
import type { AppConfig } from '../types';

const MIN_PAUSE_MS = 100;

function loadEnvFile(): void {
  const envPath = path.resolve(process.cwd(), '.env');
  if (!fs.existsSync(envPath)) return;

  const lines = fs.readFileSync(envPath, 'utf-8').split(/\r?\n/);
  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || !line.includes('=')) continue;

    const [keyRaw, ...valueParts] = line.split('=');
    const key = keyRaw.trim();
    const value = valueParts.join('=').trim().replace(/^['"]|['"]$/g, '');

    if (key && !(key in process.env)) {
      process.env[key] = value;
    }
  }
}

function mustEnv(name: string): string {
  const value = process.env[name];
  if (!value || !value.trim()) {
    throw new Error(`${name} is not set in .env file`);
  }
  return value.trim();
}

function positiveNumber(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseFloat(raw || '');
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function clampPause(input: number): number {
  return Math.max(MIN_PAUSE_MS, input);
}

export function getConfig(): AppConfig {
  loadEnvFile();

  return {
    port: Number.parseInt(process.env.PORT || '3000', 10),
    nominatimBaseUrl: (process.env.NOMINATIM_BASE_URL || 'https://nominatim.openstreetmap.org').replace(/\/+$/, ''),
    nominatimContactEmail: mustEnv('NOMINATIM_CONTACT_EMAIL'),
    nominatimUserAgent: process.env.NOMINATIM_USER_AGENT || 'crisis-assessment-engine/1.0',
    nominatimTimeoutMs: positiveNumber(process.env.NOMINATIM_TIMEOUT_MS, 8000),
    nominatimPauseMs: clampPause(positiveNumber(process.env.NOMINATIM_PAUSE_MS, MIN_PAUSE_MS)),
    shelterRadiusKm: positiveNumber(process.env.SHELTER_RADIUS_KM, 5),
    shelterLimit: Math.floor(positiveNumber(process.env.SHELTER_LIMIT, 5)),
    sessionIdleTtlMs: positiveNumber(process.env.SESSION_IDLE_TTL_MS, 30 * 60 * 1000),
  };
}
