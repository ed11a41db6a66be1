import { logger } from '../utils/logger';
import { CacheError, describeError } from '../utils/errors';
import type { AppConfig } from '../config/env';
import { FirestoreSeenStore, getFirestore } from './firestore.service';

/**
 * 이미 전송한 뉴스 ID 저장소
 */
export interface SeenStore {
  readonly name: string;
  has(id: string): Promise<boolean>;
  add(id: string): Promise<void>;
  /** 만료된 기록 삭제, 삭제 개수 반환 */
  prune(): Promise<number>;
}

export interface ProbeableSeenStore extends SeenStore {
  ping(): Promise<void>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * 프로세스 메모리 저장소 (재시작하면 초기화됨)
 */
export class MemorySeenStore implements SeenStore {
  readonly name = 'memory';
  private seen = new Map<string, number>();

  constructor(
    private ttlMs: number,
    private now: () => number = Date.now
  ) {}

  static withTtlDays(days: number): MemorySeenStore {
    return new MemorySeenStore(days * DAY_MS);
  }

  get size(): number {
    return this.seen.size;
  }

  async has(id: string): Promise<boolean> {
    const seenAt = this.seen.get(id);
    return seenAt !== undefined && this.now() - seenAt < this.ttlMs;
  }

  async add(id: string): Promise<void> {
    this.seen.set(id, this.now());
  }

  async prune(): Promise<number> {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;

    for (const [id, seenAt] of this.seen) {
      if (seenAt <= cutoff) {
        this.seen.delete(id);
        removed++;
      }
    }

    return removed;
  }
}

/**
 * 외부 저장소 + 메모리 폴백
 * - add는 항상 메모리에도 기록
 * - 외부 저장소가 한 번이라도 실패하면 프로세스 종료 시까지 메모리만 사용
 */
export class FallbackSeenStore implements SeenStore {
  private degraded = false;

  constructor(
    private primary: ProbeableSeenStore,
    private memory: MemorySeenStore
  ) {}

  get name(): string {
    return this.degraded ? `${this.primary.name}(degraded→memory)` : this.primary.name;
  }

  get isDegraded(): boolean {
    return this.degraded;
  }

  /**
   * 시작 시 연결 확인. 실패하면 메모리 모드로 전환하고 false 반환
   */
  async probe(): Promise<boolean> {
    try {
      await this.primary.ping();
      logger.success(`중복 체크 저장소 연결 확인: ${this.primary.name}`);
      return true;
    } catch (error) {
      this.degrade(new CacheError('ping', error));
      return false;
    }
  }

  async has(id: string): Promise<boolean> {
    if (await this.memory.has(id)) {
      return true;
    }
    if (this.degraded) {
      return false;
    }

    try {
      return await this.primary.has(id);
    } catch (error) {
      this.degrade(new CacheError('has', error));
      return false;
    }
  }

  async add(id: string): Promise<void> {
    await this.memory.add(id);
    if (this.degraded) {
      return;
    }

    try {
      await this.primary.add(id);
    } catch (error) {
      this.degrade(new CacheError('add', error));
    }
  }

  async prune(): Promise<number> {
    let removed = await this.memory.prune();
    if (this.degraded) {
      return removed;
    }

    try {
      removed += await this.primary.prune();
    } catch (error) {
      // 정리 실패는 다음 주기에 재시도
      logger.warn(`TTL 정책 실행 실패, 계속 진행: ${describeError(error)}`, { store: this.primary.name });
    }
    return removed;
  }

  private degrade(error: CacheError): void {
    if (!this.degraded) {
      logger.error(`${error.message} → 메모리 저장소로 전환합니다.`, { store: this.primary.name, operation: error.operation });
    }
    this.degraded = true;
  }
}

/**
 * 설정에 맞는 저장소 생성
 * FIREBASE_PROJECT_ID가 있으면 Firestore(+메모리 폴백), 없으면 메모리
 */
export async function createSeenStore(config: AppConfig): Promise<SeenStore> {
  const memory = MemorySeenStore.withTtlDays(config.SEEN_TTL_DAYS);

  if (!config.FIREBASE_PROJECT_ID) {
    logger.info('FIREBASE_PROJECT_ID 미설정: 메모리 저장소 사용 (재시작 시 초기화)');
    return memory;
  }

  let primary: FirestoreSeenStore;
  try {
    primary = new FirestoreSeenStore(getFirestore(config.FIREBASE_PROJECT_ID), {
      collection: config.SEEN_COLLECTION,
      ttlDays: config.SEEN_TTL_DAYS,
    });
  } catch (error) {
    logger.error(`${new CacheError('init', error).message} → 메모리 저장소 사용`);
    return memory;
  }

  const store = new FallbackSeenStore(primary, memory);
  await store.probe();
  return store;
}
