import 'dotenv/config';
import { loadConfig } from './config/env';
import { buildWorker } from './worker';
import { startHealthServer, type HealthServer } from './services/health.service';
import { ConfigError, describeError } from './utils/errors';
import { logger } from './utils/logger';
import { handleShutdown } from './utils/shutdown';

/**
 * 워커 엔트리 포인트
 * 설정 오류 등 시작 단계 실패는 종료 코드 1로 종료, 이후 오류는 루프 안에서 처리
 */
async function main(): Promise<void> {
  const config = loadConfig();

  logger.info('=== crypto-news-relay 시작 ===');
  const worker = await buildWorker(config);
  logger.info(`중복 체크 저장소: ${worker.seen.name}`);

  let health: HealthServer | null = null;
  if (config.ENABLE_HEALTH) {
    health = await startHealthServer({
      port: config.PORT,
      getStatus: () => worker.loop.status,
      storeName: () => worker.seen.name,
    });
  }

  worker.loop.start();

  handleShutdown({
    cleanup: async () => {
      await worker.loop.stop();
      if (health) {
        await health.close();
      }
    },
  });
}

main().catch(error => {
  if (error instanceof ConfigError) {
    logger.error(error.message);
  } else {
    logger.error(`시작 실패: ${describeError(error)}`);
  }
  process.exit(1);
});
