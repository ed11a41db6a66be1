import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import {
  CRYPTOPANIC_API_URL,
  DEFAULT_ANTHROPIC_MODEL,
  DEFAULT_FETCH_MAX_ATTEMPTS,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_HEALTH_PORT,
  DEFAULT_MAX_FETCH_LIMIT,
  DEFAULT_POLL_SECONDS,
  DEFAULT_POST_DELAY_MS,
  DEFAULT_SEEN_COLLECTION,
  DEFAULT_SEEN_TTL_DAYS,
  MAX_POLL_SECONDS,
  MAX_TIMER_MS,
} from './constants';

// .env에 빈 값으로 남아 있는 키는 미설정으로 취급
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const required = (name: string) =>
  z.preprocess(blankToUndefined, z.string({ required_error: `${name} is required` }).trim());

const optional = () => z.preprocess(blankToUndefined, z.string().trim().optional());

const withDefault = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const bool = (fallback: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .toLowerCase()
      .pipe(z.enum(['true', 'false', '1', '0']))
      .transform(value => value === 'true' || value === '1')
      .default(fallback ? 'true' : 'false')
  );

const int = (min: number, fallback: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const envSchema = z.object({
  // 뉴스 소스
  CRYPTOPANIC_KEY: required('CRYPTOPANIC_KEY'),
  CP_API_URL: z.preprocess(blankToUndefined, z.string().url().default(CRYPTOPANIC_API_URL)),
  MAX_FETCH_LIMIT: int(1, DEFAULT_MAX_FETCH_LIMIT),
  FETCH_MAX_ATTEMPTS: int(1, DEFAULT_FETCH_MAX_ATTEMPTS),

  // 요약
  ANTHROPIC_API_KEY: required('ANTHROPIC_API_KEY'),
  ANTHROPIC_MODEL: withDefault(DEFAULT_ANTHROPIC_MODEL),

  // 이미지 (키가 없으면 텍스트만 전송)
  GEMINI_API_KEY: optional(),
  GEMINI_MODEL: withDefault(DEFAULT_GEMINI_MODEL),
  IMAGE_REQUIRED: bool(false),

  // 텔레그램
  TELEGRAM_BOT_TOKEN: required('TELEGRAM_BOT_TOKEN'),
  TELEGRAM_CHAT_ID: required('TELEGRAM_CHAT_ID'),
  POST_DELAY_MS: int(0, DEFAULT_POST_DELAY_MS, MAX_TIMER_MS),

  // 중복 체크 저장소 (프로젝트 ID가 없으면 메모리 사용)
  FIREBASE_PROJECT_ID: optional(),
  SEEN_COLLECTION: withDefault(DEFAULT_SEEN_COLLECTION),
  SEEN_TTL_DAYS: int(1, DEFAULT_SEEN_TTL_DAYS),

  // 런타임
  POLL_SECONDS: int(1, DEFAULT_POLL_SECONDS, MAX_POLL_SECONDS),
  ENABLE_HEALTH: bool(false),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(DEFAULT_HEALTH_PORT)),
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' && value.trim() !== '' ? value.trim().toLowerCase() : undefined),
    z.enum(['debug', 'info', 'warn', 'error']).default('info')
  ),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * 환경 변수 검증. 문제가 있으면 모든 항목을 모아 ConfigError로 던짐
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const key = issue.path.join('.');
      return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }

  return result.data;
}
