import type { EventEmitter } from 'node:events';
import { logger } from './logger';
import { describeError } from './errors';

const SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export interface ShutdownOptions {
  cleanup: () => Promise<void>;
  exit?: (code: number) => void;
  target?: EventEmitter;
}

/**
 * SIGINT/SIGTERM 처리
 * 첫 신호: 진행 중인 패스를 정리한 뒤 종료, 정리 중 두 번째 신호: 즉시 종료
 */
export function handleShutdown(options: ShutdownOptions): void {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const target: EventEmitter = options.target ?? process;
  let shuttingDown = false;

  const onSignal = (signal: string) => {
    if (shuttingDown) {
      logger.warn(`${signal} 재수신: 정리를 기다리지 않고 종료합니다.`);
      exit(1);
      return;
    }

    shuttingDown = true;
    logger.info(`${signal} 수신: 종료 중... (한 번 더 보내면 즉시 종료)`);

    void options.cleanup().then(
      () => {
        logger.info('=== 종료 ===');
        exit(0);
      },
      error => {
        logger.error(`종료 중 오류: ${describeError(error)}`);
        exit(1);
      }
    );
  };

  for (const signal of SIGNALS) {
    target.on(signal, () => onSignal(signal));
  }
}
