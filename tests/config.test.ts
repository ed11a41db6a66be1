import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config/env';
import { ConfigError } from '../src/utils/errors';

const baseEnv = {
  CRYPTOPANIC_KEY: 'test-cp',
  ANTHROPIC_API_KEY: 'test-anthropic',
  TELEGRAM_BOT_TOKEN: 'test-bot',
  TELEGRAM_CHAT_ID: '-100123',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig(baseEnv);

    expect(cfg.POLL_SECONDS).toBe(90);
    expect(cfg.MAX_FETCH_LIMIT).toBe(15);
    expect(cfg.FETCH_MAX_ATTEMPTS).toBe(6);
    expect(cfg.POST_DELAY_MS).toBe(1200);
    expect(cfg.SEEN_TTL_DAYS).toBe(14);
    expect(cfg.SEEN_COLLECTION).toBe('seen_news');
    expect(cfg.CP_API_URL).toBe('https://cryptopanic.com/api/v1/posts/');
    expect(cfg.ANTHROPIC_MODEL).toBe('claude-haiku-4-5-20251001');
    expect(cfg.GEMINI_MODEL).toBe('gemini-2.5-flash-image');
    expect(cfg.GEMINI_API_KEY).toBeUndefined();
    expect(cfg.FIREBASE_PROJECT_ID).toBeUndefined();
    expect(cfg.IMAGE_REQUIRED).toBe(false);
    expect(cfg.ENABLE_HEALTH).toBe(false);
    expect(cfg.PORT).toBe(10000);
    expect(cfg.LOG_LEVEL).toBe('info');
  });

  it('reads overrides from strings', () => {
    const cfg = loadConfig({
      ...baseEnv,
      POLL_SECONDS: '30',
      MAX_FETCH_LIMIT: '5',
      IMAGE_REQUIRED: 'TRUE',
      ENABLE_HEALTH: '1',
      PORT: '8080',
      LOG_LEVEL: 'DEBUG',
      FIREBASE_PROJECT_ID: 'test-project',
    });

    expect(cfg.POLL_SECONDS).toBe(30);
    expect(cfg.MAX_FETCH_LIMIT).toBe(5);
    expect(cfg.IMAGE_REQUIRED).toBe(true);
    expect(cfg.ENABLE_HEALTH).toBe(true);
    expect(cfg.PORT).toBe(8080);
    expect(cfg.LOG_LEVEL).toBe('debug');
    expect(cfg.FIREBASE_PROJECT_ID).toBe('test-project');
  });

  it('treats blank values as unset', () => {
    const cfg = loadConfig({ ...baseEnv, GEMINI_API_KEY: '  ', POLL_SECONDS: '' });

    expect(cfg.GEMINI_API_KEY).toBeUndefined();
    expect(cfg.POLL_SECONDS).toBe(90);
  });

  it('lists every missing credential', () => {
    let caught: unknown;
    try {
      loadConfig({ CRYPTOPANIC_KEY: 'test-cp', TELEGRAM_CHAT_ID: '' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.issues).toEqual([
      'ANTHROPIC_API_KEY is required',
      'TELEGRAM_BOT_TOKEN is required',
      'TELEGRAM_CHAT_ID is required',
    ]);
  });

  it('rejects a non-positive poll interval', () => {
    expect(() => loadConfig({ ...baseEnv, POLL_SECONDS: '0' })).toThrow(/POLL_SECONDS/);
  });

  it('rejects a poll interval beyond the timer range', () => {
    let caught: unknown;
    try {
      loadConfig({ ...baseEnv, POLL_SECONDS: '3000000' });
    } catch (error) {
      caught = error;
    }

    expect(caught instanceof ConfigError && caught.issues).toEqual([
      'POLL_SECONDS: Number must be less than or equal to 2147483',
    ]);
    expect(loadConfig({ ...baseEnv, POLL_SECONDS: '2147483' }).POLL_SECONDS).toBe(2147483);
  });

  it('rejects a post delay beyond the timer range', () => {
    expect(() => loadConfig({ ...baseEnv, POST_DELAY_MS: '2147483648' })).toThrow(/POST_DELAY_MS/);
  });

  it('rejects an unknown boolean', () => {
    expect(() => loadConfig({ ...baseEnv, IMAGE_REQUIRED: 'maybe' })).toThrow(ConfigError);
  });
});
