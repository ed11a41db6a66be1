import type { AppConfig } from './config/env';
import type { WorkerOverrides } from './worker';
import { MemorySeenStore } from './services/seen-store.service';
import { formatPost } from './services/telegram.service';
import type { Post } from './models/news.model';
import type { Publisher } from './models/pipeline.model';
import { TELEGRAM_MESSAGE_MAX_LENGTH } from './config/constants';

export interface LocalOptions {
  dryRun: boolean;
  skipSave: boolean;
}

/**
 * 텔레그램 대신 콘솔에 출력하는 전송기 (--dry-run)
 */
export class ConsolePublisher implements Publisher {
  private nextId = 1;

  async publish(post: Post): Promise<number> {
    console.log('--- 전송 미리보기 ---');
    console.log(formatPost(post, TELEGRAM_MESSAGE_MAX_LENGTH));
    if (post.image) {
      console.log(
        post.image.kind === 'bytes'
          ? `[이미지] ${post.image.mimeType}, ${post.image.data.byteLength} bytes`
          : `[이미지] ${post.image.url}`
      );
    }
    console.log('');
    return this.nextId++;
  }
}

/**
 * CLI 인자 파싱
 * --dry-run은 실제로 전송하지 않으므로 저장소도 메모리로 대체 (--no-save 포함)
 */
export function parseLocalArgs(args: string[]): LocalOptions {
  const dryRun = args.includes('--dry-run');
  const skipSave = dryRun || args.includes('--no-save') || args.includes('--skip-save');
  return { dryRun, skipSave };
}

export function localOverrides(options: LocalOptions, config: AppConfig): WorkerOverrides {
  const overrides: WorkerOverrides = {};

  if (options.dryRun) {
    overrides.publisher = new ConsolePublisher();
  }
  if (options.skipSave) {
    overrides.seen = MemorySeenStore.withTtlDays(config.SEEN_TTL_DAYS);
  }

  return overrides;
}
