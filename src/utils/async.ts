import { setTimeout as delay } from 'node:timers/promises';

/**
 * ms 만큼 대기. signal이 abort되면 즉시 reject
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(ms, undefined, { signal });
}

export type Sleep = typeof sleep;

/**
 * 지정 시간 안에 끝나지 않으면 reject (Firestore 등 자체 타임아웃이 없는 호출용)
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
