import type { GeneratedImage, NewsItem, PipelineResult, Summary } from '../models/news.model';
import type {
  ImageGenerator,
  ItemFailure,
  NewsSource,
  PassReport,
  PipelineStage,
  Publisher,
  Summarizer,
} from '../models/pipeline.model';
import type { SeenStore } from './seen-store.service';
import { logger } from '../utils/logger';
import { describeError } from '../utils/errors';
import { sleep as defaultSleep, type Sleep } from '../utils/async';
import { PRUNE_INTERVAL_MS } from '../config/constants';

export interface NewsPipelineDeps {
  source: NewsSource;
  summarizer: Summarizer;
  /** null이면 이미지 없이 텍스트만 전송 */
  imageGenerator: ImageGenerator | null;
  publisher: Publisher;
  seen: SeenStore;
}

export interface NewsPipelineOptions {
  fetchLimit: number;
  postDelayMs: number;
  /** true면 이미지 생성 실패 시 해당 뉴스를 건너뜀 */
  imageRequired: boolean;
  pruneIntervalMs?: number;
  sleep?: Sleep;
  now?: () => number;
}

class StageError extends Error {
  constructor(
    readonly stage: PipelineStage,
    cause: unknown
  ) {
    super(describeError(cause), { cause });
    this.name = 'StageError';
  }
}

/**
 * 한 번의 패스: 조회 → 중복 체크 → (요약 → 이미지 → 전송 → 기록) × 신규 뉴스
 */
export class NewsPipeline {
  private sleep: Sleep;
  private now: () => number;
  private pruneIntervalMs: number;
  private lastPruneAt: number | null = null;

  constructor(
    private deps: NewsPipelineDeps,
    private options: NewsPipelineOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.pruneIntervalMs = options.pruneIntervalMs ?? PRUNE_INTERVAL_MS;
  }

  async runPass(signal?: AbortSignal): Promise<PassReport> {
    const report: PassReport = { fetched: 0, skipped: 0, posted: 0, failures: [], aborted: false };

    await this.pruneIfDue();

    // 1. 뉴스 조회
    let items: NewsItem[];
    try {
      items = await this.deps.source.fetchLatest(this.options.fetchLimit, signal);
    } catch (error) {
      if (signal?.aborted) {
        report.aborted = true;
        return report;
      }
      logger.error(`뉴스 조회 실패, 이번 패스 종료: ${describeError(error)}`);
      return report;
    }

    report.fetched = items.length;
    if (items.length === 0) {
      logger.info('조회된 뉴스가 없습니다.');
      return report;
    }

    for (const item of items) {
      // 종료 요청 시 다음 뉴스로 넘어가지 않음 (처리 중이던 뉴스는 기록까지 마침)
      if (signal?.aborted) {
        report.aborted = true;
        logger.info('종료 요청으로 패스 중단');
        break;
      }

      // 2. 중복 체크
      if (await this.deps.seen.has(item.id)) {
        logger.debug('이미 전송한 뉴스 스킵', { id: item.id });
        report.skipped++;
        continue;
      }

      // 3. 요약 → 이미지 → 전송
      logger.info(`뉴스 처리 중: ${item.title}`, { id: item.id });
      try {
        const result = await this.processItem(item);
        report.posted++;
        logger.success('전송 완료', { id: item.id, messageId: result.messageId, image: result.image !== null });
      } catch (error) {
        const failure = toFailure(item, error);
        report.failures.push(failure);
        logger.error(`뉴스 처리 실패 (기록하지 않음): ${failure.message}`, { id: item.id, stage: failure.stage });
        continue;
      }

      // 4. 전송 성공 후에만 기록
      try {
        await this.deps.seen.add(item.id);
      } catch (error) {
        logger.error(`전송 기록 실패: ${describeError(error)}`, { id: item.id, store: this.deps.seen.name });
      }

      if (this.options.postDelayMs > 0) {
        try {
          await this.sleep(this.options.postDelayMs, signal);
        } catch {
          report.aborted = true;
          break;
        }
      }
    }

    logger.info(`패스 완료: ${report.posted}개 전송`, {
      fetched: report.fetched,
      skipped: report.skipped,
      failed: report.failures.length,
    });
    return report;
  }

  /**
   * 뉴스 한 건 처리. 실패 시 단계 정보가 담긴 StageError
   */
  async processItem(item: NewsItem): Promise<PipelineResult> {
    let summary: Summary;
    try {
      summary = await this.deps.summarizer.summarize(item);
    } catch (error) {
      throw new StageError('summarize', error);
    }

    const image = await this.generateImage(item, summary);

    let messageId: number;
    try {
      messageId = await this.deps.publisher.publish({ item, summary, image });
    } catch (error) {
      throw new StageError('publish', error);
    }

    return { item, summary, image, messageId };
  }

  private async generateImage(item: NewsItem, summary: Summary): Promise<GeneratedImage | null> {
    if (!this.deps.imageGenerator) {
      return null;
    }

    try {
      return await this.deps.imageGenerator.generate(summary.imagePrompt);
    } catch (error) {
      if (this.options.imageRequired) {
        throw new StageError('image', error);
      }
      logger.warn(`이미지 생성 실패, 텍스트만 전송: ${describeError(error)}`, { id: item.id, stage: 'image' });
      return null;
    }
  }

  private async pruneIfDue(): Promise<void> {
    const now = this.now();
    if (this.lastPruneAt !== null && now - this.lastPruneAt < this.pruneIntervalMs) {
      return;
    }
    this.lastPruneAt = now;

    try {
      const removed = await this.deps.seen.prune();
      if (removed > 0) {
        logger.info(`만료된 중복 기록 ${removed}개 삭제`, { store: this.deps.seen.name });
      }
    } catch (error) {
      logger.warn(`TTL 정책 실행 실패, 계속 진행: ${describeError(error)}`, { store: this.deps.seen.name });
    }
  }
}

function toFailure(item: NewsItem, error: unknown): ItemFailure {
  if (error instanceof StageError) {
    return { itemId: item.id, stage: error.stage, message: error.message };
  }
  return { itemId: item.id, stage: 'publish', message: describeError(error) };
}
