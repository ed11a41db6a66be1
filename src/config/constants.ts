// CryptoPanic 뉴스 API
export const CRYPTOPANIC_API_URL = 'https://cryptopanic.com/api/v1/posts/';
export const NEWS_REQUEST_TIMEOUT_MS = 20_000;
export const NEWS_BACKOFF_INITIAL_SECONDS = 2;
export const NEWS_BACKOFF_MAX_SECONDS = 300;
export const NEWS_EXCERPT_MAX_LENGTH = 1000;

// 요약 (Claude API)
export const DEFAULT_ANTHROPIC_MODEL = 'claude-haiku-4-5-20251001';
export const SUMMARY_MAX_TOKENS = 400;
export const SUMMARY_TEMPERATURE = 0.2;
export const SUMMARY_FALLBACK_MAX_LENGTH = 800;
export const CAPTION_MAX_LENGTH = 120;
export const LLM_REQUEST_TIMEOUT_MS = 60_000;

// 이미지 생성 (Gemini API)
export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash-image';
export const IMAGE_PROMPT_LOG_LENGTH = 240;

// 텔레그램
export const TELEGRAM_API_BASE = 'https://api.telegram.org';
export const TELEGRAM_REQUEST_TIMEOUT_MS = 30_000;
export const TELEGRAM_CAPTION_MAX_LENGTH = 1024; // sendPhoto caption 제한
export const TELEGRAM_MESSAGE_MAX_LENGTH = 4096; // sendMessage text 제한

// 중복 체크 저장소
export const DEFAULT_SEEN_COLLECTION = 'seen_news';
export const DEFAULT_SEEN_TTL_DAYS = 14;
export const STORE_TIMEOUT_MS = 10_000;
export const STORE_BATCH_SIZE = 500; // Firestore 배치 쓰기 최대 개수
export const PRUNE_INTERVAL_MS = 60 * 60 * 1000;

// 폴링
export const DEFAULT_POLL_SECONDS = 90;
export const DEFAULT_MAX_FETCH_LIMIT = 15;
export const DEFAULT_FETCH_MAX_ATTEMPTS = 6;
export const DEFAULT_POST_DELAY_MS = 1200; // 연속 전송 간격
export const DEFAULT_HEALTH_PORT = 10000;
export const MAX_TIMER_MS = 2_147_483_647; // setTimeout 상한 (2^31-1), 넘으면 1ms로 바뀜
export const MAX_POLL_SECONDS = Math.floor(MAX_TIMER_MS / 1000);
