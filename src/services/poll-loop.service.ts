import type { PassReport } from '../models/pipeline.model';
import { logger } from '../utils/logger';
import { describeError } from '../utils/errors';

export type LoopState = 'idle' | 'processing' | 'stopped';

export interface LoopStatus {
  state: LoopState;
  passes: number;
  lastPassAt: string | null;
  lastReport: PassReport | null;
}

export type PassRunner = (signal: AbortSignal) => Promise<PassReport>;

/**
 * 고정 주기 폴링 루프
 * - 패스가 끝난 뒤에만 다음 타이머를 건다 (패스가 겹치지 않음)
 * - 처리 중에 들어온 tick은 건너뜀
 */
export class PollLoop {
  private state: LoopState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private current: Promise<PassReport | null> | null = null;
  private passes = 0;
  private lastPassAt: Date | null = null;
  private lastReport: PassReport | null = null;

  constructor(
    private runPass: PassRunner,
    private intervalMs: number
  ) {}

  get status(): LoopStatus {
    return {
      state: this.state,
      passes: this.passes,
      lastPassAt: this.lastPassAt ? this.lastPassAt.toISOString() : null,
      lastReport: this.lastReport,
    };
  }

  /**
   * 첫 패스를 바로 실행하고 이후 intervalMs마다 반복
   */
  start(): void {
    if (this.state === 'stopped') {
      throw new Error('PollLoop has been stopped');
    }
    if (this.timer || this.state === 'processing') {
      return;
    }

    logger.info(`폴링 시작: ${Math.round(this.intervalMs / 1000)}초 주기`);
    this.cycle().catch(error => logger.error(`폴링 주기 오류: ${describeError(error)}`));
  }

  /**
   * 패스 1회 실행. 이미 처리 중이거나 중지된 경우 null
   */
  async tick(): Promise<PassReport | null> {
    if (this.state === 'processing') {
      logger.warn('이전 패스가 아직 진행 중이라 이번 주기는 건너뜁니다.');
      return null;
    }
    if (this.state === 'stopped') {
      return null;
    }

    this.state = 'processing';
    const controller = new AbortController();
    this.controller = controller;

    const run = this.execute(controller.signal);
    this.current = run;

    try {
      return await run;
    } finally {
      this.current = null;
      this.controller = null;
      if (this.state === 'processing') {
        this.state = 'idle';
      }
    }
  }

  /**
   * 타이머 해제 후 진행 중인 패스를 중단하고 끝날 때까지 대기
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }

    this.state = 'stopped';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.controller) {
      logger.info('진행 중인 패스 종료 대기 중...');
      this.controller.abort();
    }
    if (this.current) {
      await this.current;
    }
    logger.info('폴링 중지');
  }

  private async execute(signal: AbortSignal): Promise<PassReport | null> {
    try {
      const report = await this.runPass(signal);
      this.lastReport = report;
      return report;
    } catch (error) {
      logger.error(`패스 실행 중 처리되지 않은 오류: ${describeError(error)}`);
      return null;
    } finally {
      this.passes++;
      this.lastPassAt = new Date();
    }
  }

  private async cycle(): Promise<void> {
    await this.tick();
    this.schedule();
  }

  private schedule(): void {
    if (this.state === 'stopped') {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.cycle().catch(error => logger.error(`폴링 주기 오류: ${describeError(error)}`));
    }, this.intervalMs);
  }
}
