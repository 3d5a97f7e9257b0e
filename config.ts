import { promises as fs } from 'fs';
import type { AuthMode } from './types';
import { isRecord } from './lib/daikin/Mappers';
import { DEFAULT_BASE_URL } from './lib/daikin/http';

export type SmartAppSettings = Record<string, unknown>;

export interface SmartAppConfig {
  storagePath: string;
  baseUrl: string;
  authMode: AuthMode;
  pollIntervalMs: number;
  confirmationTimeoutMs: number;
  staleAfterFailures: number;
  maxBackoffMs: number;
  sessionSafetyMarginMs: number;
  maxInvalidations: number;
  invalidationWindowMs: number;
  requestTimeoutMs: number;
  rateLimitConcurrency: number;
  rateLimitIntervalMs: number;
  debugLogging: boolean;
}

export const DEFAULT_STORAGE_PATH = './.daikin-smartapp';

const readString = (value: unknown, fallback: string): string =>
  typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback;

const readFlag = (value: unknown): boolean => value === true || value === 'true' || value === 1;

/**
 * Builds the engine configuration from flat settings. Durations are given in
 * seconds (minutes for the backoff ceiling) and returned in milliseconds.
 */
export function loadConfig(settings: SmartAppSettings = {}): SmartAppConfig {
  const pollIntervalSeconds = Number(settings.pollIntervalSeconds) || 30;
  const confirmationTimeoutSeconds = Number(settings.confirmationTimeoutSeconds) || 90;
  const maxBackoffMinutes = Number(settings.maxBackoffMinutes) || 10;
  const sessionSafetyMarginSeconds = Number(settings.sessionSafetyMarginSeconds) || 60;
  const invalidationWindowSeconds = Number(settings.invalidationWindowSeconds) || 60;

  return {
    storagePath: readString(settings.storagePath, DEFAULT_STORAGE_PATH),
    baseUrl: readString(settings.baseUrl, DEFAULT_BASE_URL),
    authMode: settings.authMode === 'access_token' ? 'access_token' : 'id_token',
    pollIntervalMs: pollIntervalSeconds * 1000,
    confirmationTimeoutMs: confirmationTimeoutSeconds * 1000,
    staleAfterFailures: Number(settings.staleAfterFailures) || 3,
    maxBackoffMs: maxBackoffMinutes * 60 * 1000,
    sessionSafetyMarginMs: sessionSafetyMarginSeconds * 1000,
    maxInvalidations: Number(settings.maxInvalidations) || 3,
    invalidationWindowMs: invalidationWindowSeconds * 1000,
    requestTimeoutMs: Number(settings.requestTimeoutMs) || 20000,
    rateLimitConcurrency: Number(settings.rateLimitConcurrency) || 2,
    rateLimitIntervalMs: Number(settings.rateLimitIntervalMs) || 400,
    debugLogging: readFlag(settings.debugLogging),
  };
}

/** Reads a JSON settings file. A missing file yields no settings. */
export async function readSettingsFile(filePath: string): Promise<SmartAppSettings> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Settings file ${filePath} must contain a JSON object`);
  }
  return parsed;
}
