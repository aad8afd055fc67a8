import { config } from 'dotenv';
import { UpdaterError } from './errors.js';

config();

export const DEFAULT_GRAPHQL_URL = 'https://leetcode.com/graphql';
export const DEFAULT_START_MARKER = '<!-- LEETCODE_STATS_START -->';
export const DEFAULT_END_MARKER = '<!-- LEETCODE_STATS_END -->';
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export interface StatsConfig {
  username: string;
  readmePath: string;
  graphqlUrl: string;
  requestTimeoutMs: number;
  startMarker: string;
  endMarker: string;
  showUpdatedAt: boolean;
  logLevel: string;
  logFile?: string;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new UpdaterError('ConfigInvalid', `${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseFlag(raw: string | undefined): boolean {
  return raw !== undefined && ['1', 'true', 'yes'].includes(raw.trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): StatsConfig {
  const username = env.LEETCODE_USERNAME?.trim();
  if (!username) {
    throw new UpdaterError('ConfigMissing', 'Missing required environment variable: LEETCODE_USERNAME');
  }

  const startMarker = env.STATS_START_MARKER || DEFAULT_START_MARKER;
  const endMarker = env.STATS_END_MARKER || DEFAULT_END_MARKER;
  if (startMarker === endMarker) {
    throw new UpdaterError('ConfigInvalid', 'STATS_START_MARKER and STATS_END_MARKER must differ');
  }

  return {
    username,
    readmePath: env.README_PATH || 'README.md',
    graphqlUrl: env.LEETCODE_GRAPHQL_URL || DEFAULT_GRAPHQL_URL,
    requestTimeoutMs: parsePositiveInt('REQUEST_TIMEOUT_MS', env.REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS),
    startMarker,
    endMarker,
    showUpdatedAt: parseFlag(env.SHOW_UPDATED_AT),
    logLevel: env.LOG_LEVEL || 'info',
    logFile: env.LOG_FILE || undefined,
  };
}
