import { DEFAULT_CAUSE_PREFIX, type ReportConfig } from './types.js';
import { isRecord } from './utils.js';

export const ENV_CAUSE_PREFIX = 'ERROR_CONTEXT_CAUSE_PREFIX';
export const ENV_MAX_CAUSES = 'ERROR_CONTEXT_MAX_CAUSES';
export const ENV_SHOW_LOCATION = 'ERROR_CONTEXT_SHOW_LOCATION';

/** Strips ASCII control characters (< 0x20 except newline) to prevent log injection. */
function sanitizeForMessage(str: string): string {
  return str.replace(/[\x00-\x09\x0b-\x1f]/g, '');
}

function parseBoolean(raw: unknown, field: string, defaultValue: boolean): boolean {
  if (raw == null) {
    return defaultValue;
  }
  if (typeof raw !== 'boolean') {
    throw new Error(`config.${field} must be a boolean`);
  }
  return raw;
}

function parseCausePrefix(raw: unknown): string {
  if (raw == null) {
    return DEFAULT_CAUSE_PREFIX;
  }
  if (typeof raw !== 'string') {
    throw new Error('config.causePrefix must be a string');
  }
  if (raw.includes('\n')) {
    throw new Error('config.causePrefix must not contain a newline');
  }
  return raw;
}

function parseMaxCauses(raw: unknown): number | undefined {
  if (raw == null) {
    return undefined;
  }
  if (typeof raw !== 'number' || !Number.isInteger(raw) || raw <= 0) {
    throw new Error('config.maxCauses must be a positive integer');
  }
  return raw;
}

export function parseReportConfig(raw: unknown): ReportConfig {
  if (raw == null) {
    return getDefaultReportConfig();
  }
  if (!isRecord(raw)) {
    throw new Error('report config must be an object');
  }
  const config: ReportConfig = {
    causePrefix: parseCausePrefix(raw['causePrefix']),
    showLocation: parseBoolean(raw['showLocation'], 'showLocation', true),
  };
  const maxCauses = parseMaxCauses(raw['maxCauses']);
  if (maxCauses !== undefined) {
    config.maxCauses = maxCauses;
  }
  return config;
}

function envBoolean(value: string, name: string): boolean {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
      return true;
    case '0':
    case 'false':
      return false;
    default:
      throw new Error(`${name} must be one of 1, true, 0, false (got "${sanitizeForMessage(value)}")`);
  }
}

function envPositiveInt(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer (got "${sanitizeForMessage(value)}")`);
  }
  return parsed;
}

/**
 * Builds a ReportConfig from environment variables. Unset or empty variables
 * fall back to the defaults.
 */
export function loadReportConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const raw: Record<string, unknown> = {};
  const prefix = env[ENV_CAUSE_PREFIX];
  if (prefix !== undefined && prefix !== '') {
    raw['causePrefix'] = prefix;
  }
  const maxCauses = env[ENV_MAX_CAUSES];
  if (maxCauses !== undefined && maxCauses !== '') {
    raw['maxCauses'] = envPositiveInt(maxCauses, ENV_MAX_CAUSES);
  }
  const showLocation = env[ENV_SHOW_LOCATION];
  if (showLocation !== undefined && showLocation !== '') {
    raw['showLocation'] = envBoolean(showLocation, ENV_SHOW_LOCATION);
  }
  return parseReportConfig(raw);
}

export function getDefaultReportConfig(): ReportConfig {
  return {
    causePrefix: DEFAULT_CAUSE_PREFIX,
    showLocation: true,
  };
}
