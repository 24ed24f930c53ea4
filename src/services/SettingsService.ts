// src/services/SettingsService.ts
import { config as loadDotenv } from 'dotenv';
import { DEFAULT_SETTINGS, type AppSettings, type ChunkMode } from '../core/app-types';
import type { Logger } from '../core/logger';

type SettingKey = keyof AppSettings;

export type SettingsSource = Record<string, string | undefined>;

/**
 * Environment variable backing each setting.
 */
export const SETTING_ENV_VARS: Record<SettingKey, string> = {
  baseUrl: 'DEFAULT_BASE_URL',
  token: 'DEFAULT_TOKEN',
  dailyTargetHours: 'DEFAULT_HOURS',
  maxEntryHours: 'DEFAULT_MAX_DURATION',
  taskLookbackDays: 'DEFAULT_TASK_DAYS_RANGE',
  dayStartHour: 'DEFAULT_DAY_START_HOUR',
  utcOffsetMinutes: 'DEFAULT_UTC_OFFSET_MINUTES',
  chunkMode: 'DEFAULT_CHUNK_MODE',
};

interface SettingParser<T> {
  parse(raw: string): T | undefined;
  rule: string;
}

const positiveNumber: SettingParser<number> = {
  parse: (raw) => {
    const n = Number(raw);
    return Number.isFinite(n) && n > 0 ? n : undefined;
  },
  rule: 'must be a positive number',
};

function integerBetween(min: number, max: number): SettingParser<number> {
  return {
    parse: (raw) => {
      if (!/^[-+]?\d+$/.test(raw)) return undefined;
      const n = Number(raw);
      return n >= min && n <= max ? n : undefined;
    },
    rule: `must be an integer from ${min} to ${max}`,
  };
}

const anyString: SettingParser<string> = { parse: (raw) => raw, rule: '' };

const chunkMode: SettingParser<ChunkMode> = {
  parse: (raw) => (raw === 'hourly' || raw === 'random' ? raw : undefined),
  rule: 'must be "hourly" or "random"',
};

const PARSERS: { [K in SettingKey]: SettingParser<AppSettings[K]> } = {
  baseUrl: anyString,
  token: anyString,
  dailyTargetHours: positiveNumber,
  maxEntryHours: positiveNumber,
  taskLookbackDays: integerBetween(1, 3650),
  dayStartHour: integerBetween(0, 23),
  utcOffsetMinutes: integerBetween(-720, 840),
  chunkMode,
};

/**
 * Loads KEY=value pairs from a .env file into process.env without
 * overriding variables that are already set. A missing file is fine.
 */
export function loadEnvFile(path = '.env'): void {
  loadDotenv({ path });
}

export class SettingsService {
  constructor(
    private readonly source: SettingsSource,
    private readonly logger?: Logger,
  ) {}

  /**
   * Retrieves a specific setting's value.
   * If the variable is unset or blank, it returns the default value; an
   * invalid value is reported and replaced by the default.
   * @param key The setting to retrieve.
   */
  public get<K extends SettingKey>(key: K): AppSettings[K] {
    const envVar = SETTING_ENV_VARS[key];
    const raw = (this.source[envVar] ?? '').trim();
    if (!raw) return DEFAULT_SETTINGS[key];

    const parser: SettingParser<AppSettings[K]> = PARSERS[key];
    const parsed = parser.parse(raw);
    if (parsed === undefined) {
      this.logger?.log('WARN', `Invalid ${envVar}=${JSON.stringify(raw)} (${parser.rule}); using ${DEFAULT_SETTINGS[key]}.`);
      return DEFAULT_SETTINGS[key];
    }
    return parsed;
  }

  public getAll(): AppSettings {
    return {
      baseUrl: this.get('baseUrl'),
      token: this.get('token'),
      dailyTargetHours: this.get('dailyTargetHours'),
      maxEntryHours: this.get('maxEntryHours'),
      taskLookbackDays: this.get('taskLookbackDays'),
      dayStartHour: this.get('dayStartHour'),
      utcOffsetMinutes: this.get('utcOffsetMinutes'),
      chunkMode: this.get('chunkMode'),
    };
  }
}
