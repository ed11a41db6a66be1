import axios from 'axios';

/**
 * 필수 환경 변수 누락/형식 오류. 시작 시점에만 발생하며 프로세스를 종료시킨다.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * 외부 API(뉴스, 요약, 이미지, 텔레그램) 호출 실패
 */
export class ProviderError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`[${provider}] ${message}`, { cause: options.cause });
    this.name = 'ProviderError';
    this.provider = provider;
    this.status = options.status;
  }
}

/**
 * 중복 체크 저장소(Firestore) 접근 실패
 */
export class CacheError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Seen store ${operation} failed: ${describeError(cause)}`, { cause });
    this.name = 'CacheError';
    this.operation = operation;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 임의의 오류를 ProviderError로 변환 (axios 오류면 응답 상태/본문 포함)
 */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const data: unknown = error.response?.data;
    const detail = data === undefined ? error.message : JSON.stringify(data);
    return new ProviderError(provider, status ? `HTTP ${status}: ${detail}` : detail, { status, cause: error });
  }

  return new ProviderError(provider, describeError(error), { cause: error });
}
