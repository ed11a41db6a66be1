import 'dotenv/config';
import { loadConfig } from './config/env';
import { buildWorker } from './worker';
import { localOverrides, parseLocalArgs } from './local-options';
import { logger } from './utils/logger';
import { describeError } from './utils/errors';

async function main() {
  console.log('\n=== 로컬 테스트 (1회 실행) ===\n');

  const options = parseLocalArgs(process.argv.slice(2));

  if (options.dryRun) {
    console.log('⚠️  dry-run 모드: 텔레그램 대신 콘솔에 출력');
  }
  if (options.skipSave) {
    console.log('⚠️  Firestore 저장 건너뛰기 모드: 메모리 저장소 사용');
  }

  try {
    const config = loadConfig();
    const { pipeline } = await buildWorker(config, localOverrides(options, config));
    const report = await pipeline.runPass();

    console.log('\n=== 결과 ===\n');
    console.log(`조회: ${report.fetched}개`);
    console.log(`중복 스킵: ${report.skipped}개`);
    console.log(`전송: ${report.posted}개`);
    report.failures.forEach(failure => {
      console.log(`실패: ${failure.itemId} [${failure.stage}] ${failure.message}`);
    });

    console.log('\n=== 완료 ===\n');
    process.exit(report.failures.length > 0 ? 1 : 0);

  } catch (error) {
    logger.error(`실행 중 오류 발생: ${describeError(error)}`);
    process.exit(1);
  }
}

void main();
