import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SettingsService, loadEnvFile } from './SettingsService';
import { DEFAULT_SETTINGS } from '../core/app-types';
import { createMemoryLogger } from '../test-helpers';

describe('SettingsService', () => {
  let logger: ReturnType<typeof createMemoryLogger>;

  beforeEach(() => {
    logger = createMemoryLogger();
  });

  describe('get', () => {
    it('should return the default value if the variable is unset or blank', () => {
      // Arrange
      const settingsService = new SettingsService({ DEFAULT_HOURS: '   ' }, logger);

      // Act
      const hours = settingsService.get('dailyTargetHours');

      // Assert
      expect(hours).toBe(DEFAULT_SETTINGS.dailyTargetHours);
      expect(settingsService.get('maxEntryHours')).toBe(2);
      expect(settingsService.get('taskLookbackDays')).toBe(60);
      expect(logger.lines).toEqual([]);
    });

    it('should return the configured value if it is valid', () => {
      const settingsService = new SettingsService(
        {
          DEFAULT_BASE_URL: 'https://jira.internal.test',
          DEFAULT_TOKEN: 'test-token',
          DEFAULT_HOURS: '7.5',
          DEFAULT_MAX_DURATION: '3',
          DEFAULT_TASK_DAYS_RANGE: '30',
          DEFAULT_DAY_START_HOUR: '9',
          DEFAULT_UTC_OFFSET_MINUTES: '-300',
          DEFAULT_CHUNK_MODE: 'random',
        },
        logger,
      );

      expect(settingsService.getAll()).toEqual({
        baseUrl: 'https://jira.internal.test',
        token: 'test-token',
        dailyTargetHours: 7.5,
        maxEntryHours: 3,
        taskLookbackDays: 30,
        dayStartHour: 9,
        utcOffsetMinutes: -300,
        chunkMode: 'random',
      });
    });

    it('should warn and fall back to the default for invalid values', () => {
      const settingsService = new SettingsService(
        { DEFAULT_HOURS: 'four', DEFAULT_TASK_DAYS_RANGE: '0', DEFAULT_CHUNK_MODE: 'daily' },
        logger,
      );

      expect(settingsService.get('dailyTargetHours')).toBe(4);
      expect(settingsService.get('taskLookbackDays')).toBe(60);
      expect(settingsService.get('chunkMode')).toBe('hourly');
      expect(logger.lines).toEqual([
        { tag: 'WARN', message: 'Invalid DEFAULT_HOURS="four" (must be a positive number); using 4.' },
        { tag: 'WARN', message: 'Invalid DEFAULT_TASK_DAYS_RANGE="0" (must be an integer from 1 to 3650); using 60.' },
        { tag: 'WARN', message: 'Invalid DEFAULT_CHUNK_MODE="daily" (must be "hourly" or "random"); using hourly.' },
      ]);
    });

    it('rejects fractional values for integer settings', () => {
      const settingsService = new SettingsService({ DEFAULT_DAY_START_HOUR: '9.5' }, logger);
      expect(settingsService.get('dayStartHour')).toBe(10);
    });
  });

  describe('loadEnvFile', () => {
    let dir: string;
    const touched = ['WF_TEST_FROM_FILE', 'WF_TEST_ALREADY_SET'];

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'worklog-filler-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
      for (const key of touched) delete process.env[key];
    });

    it('fills unset variables without overriding existing ones', () => {
      const file = join(dir, '.env');
      writeFileSync(file, 'WF_TEST_FROM_FILE="from file"\nWF_TEST_ALREADY_SET=from-file\n');
      process.env.WF_TEST_ALREADY_SET = 'from-shell';

      loadEnvFile(file);

      expect(process.env.WF_TEST_FROM_FILE).toBe('from file');
      expect(process.env.WF_TEST_ALREADY_SET).toBe('from-shell');
    });

    it('ignores a missing file', () => {
      expect(() => loadEnvFile(join(dir, 'missing.env'))).not.toThrow();
    });
  });
});
