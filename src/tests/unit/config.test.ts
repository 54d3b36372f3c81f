import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.storeDriver).toBe('sqlite');
    expect(config.rollingWindowDays).toBe(7);
    expect(config.minNightsForAdvice).toBe(1);
    expect(config.initialTargetWake).toBe('07:00');
    expect(config.initialWindowMinutes).toBe(360);
    expect(config.reviewWeekday).toBe(1);
    expect(config.autoApplyAdjustments).toBe(false);
    expect(config.port).toBe(5000);
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      STORE_DRIVER: 'json',
      DIARY_FILE_PATH: '/tmp/diary.json',
      ROLLING_WINDOW_DAYS: '14',
      AUTO_APPLY_ADJUSTMENTS: 'true',
      INITIAL_WINDOW_MINUTES: '405',
    });

    expect(config.storeDriver).toBe('json');
    expect(config.diaryFilePath).toBe('/tmp/diary.json');
    expect(config.rollingWindowDays).toBe(14);
    expect(config.autoApplyAdjustments).toBe(true);
    expect(config.initialWindowMinutes).toBe(405);
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ PORT: '', REVIEW_TIME: '' })).toMatchObject({ port: 5000, reviewTime: '08:00' });
  });

  it('rejects a window that is not a whole quarter hour', () => {
    expect(() => loadConfig({ INITIAL_WINDOW_MINUTES: '310' })).toThrow(ConfigError);
  });

  it('rejects a wake time without two-digit hours', () => {
    expect(() => loadConfig({ INITIAL_TARGET_WAKE: '7:00' })).toThrow(
      'Configuration validation failed:\ninitialTargetWake: must be HH:MM'
    );
  });
});
