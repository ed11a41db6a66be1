import type { AppConfig } from './config/env';
import type { ImageGenerator, Publisher } from './models/pipeline.model';
import { CryptoPanicService } from './services/cryptopanic.service';
import { SummarizerService } from './services/summarizer.service';
import { ImageGeneratorService } from './services/image-generator.service';
import { TelegramService } from './services/telegram.service';
import { NewsPipeline } from './services/news-pipeline.service';
import { PollLoop } from './services/poll-loop.service';
import { createSeenStore, type SeenStore } from './services/seen-store.service';
import { logger, setLogLevel } from './utils/logger';

export interface Worker {
  pipeline: NewsPipeline;
  loop: PollLoop;
  seen: SeenStore;
}

export interface WorkerOverrides {
  seen?: SeenStore;
  publisher?: Publisher;
}

export function createImageGenerator(config: AppConfig): ImageGenerator | null {
  if (!config.GEMINI_API_KEY) {
    logger.warn('GEMINI_API_KEY 미설정: 이미지 없이 텍스트만 전송합니다.');
    return null;
  }
  return new ImageGeneratorService({ apiKey: config.GEMINI_API_KEY, model: config.GEMINI_MODEL });
}

/**
 * 설정으로 서비스 구성 (저장소/전송기는 로컬 실행용으로 교체 가능)
 */
export async function buildWorker(config: AppConfig, overrides: WorkerOverrides = {}): Promise<Worker> {
  setLogLevel(config.LOG_LEVEL);
  const seen = overrides.seen ?? (await createSeenStore(config));

  const pipeline = new NewsPipeline(
    {
      source: new CryptoPanicService({
        apiKey: config.CRYPTOPANIC_KEY,
        apiUrl: config.CP_API_URL,
        maxAttempts: config.FETCH_MAX_ATTEMPTS,
      }),
      summarizer: new SummarizerService({ apiKey: config.ANTHROPIC_API_KEY, model: config.ANTHROPIC_MODEL }),
      imageGenerator: createImageGenerator(config),
      publisher:
        overrides.publisher ??
        new TelegramService({ botToken: config.TELEGRAM_BOT_TOKEN, chatId: config.TELEGRAM_CHAT_ID }),
      seen,
    },
    {
      fetchLimit: config.MAX_FETCH_LIMIT,
      postDelayMs: config.POST_DELAY_MS,
      imageRequired: config.IMAGE_REQUIRED,
    }
  );

  const loop = new PollLoop(signal => pipeline.runPass(signal), config.POLL_SECONDS * 1000);

  return { pipeline, loop, seen };
}
