import { createHash } from 'node:crypto';
import * as admin from 'firebase-admin';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/async';
import { STORE_BATCH_SIZE, STORE_TIMEOUT_MS } from '../config/constants';
import type { ProbeableSeenStore } from './seen-store.service';

export interface FirestoreSeenStoreOptions {
  collection: string;
  ttlDays: number;
  timeoutMs?: number;
}

/**
 * Firebase Admin 초기화 (이미 초기화되어 있으면 재사용)
 * 인증은 Application Default Credentials 사용
 */
export function getFirestore(projectId: string): admin.firestore.Firestore {
  if (!admin.apps.length) {
    admin.initializeApp({ projectId });
  }
  return admin.firestore();
}

/**
 * Firestore 기반 중복 체크 저장소
 * - 문서 ID: 뉴스 ID의 SHA-256 (URL 등 '/'가 포함된 ID 대응)
 * - TTL 정책: expiresAt이 지난 문서는 없는 것으로 취급하고 prune()에서 삭제
 */
export class FirestoreSeenStore implements ProbeableSeenStore {
  readonly name = 'firestore';
  private collection: admin.firestore.CollectionReference;
  private ttlMs: number;
  private timeoutMs: number;

  constructor(db: admin.firestore.Firestore, options: FirestoreSeenStoreOptions) {
    this.collection = db.collection(options.collection);
    this.ttlMs = options.ttlDays * 24 * 60 * 60 * 1000;
    this.timeoutMs = options.timeoutMs ?? STORE_TIMEOUT_MS;
  }

  static docId(itemId: string): string {
    return createHash('sha256').update(itemId).digest('hex');
  }

  /**
   * 연결 확인용 단건 조회
   */
  async ping(): Promise<void> {
    await withTimeout(this.collection.limit(1).get(), this.timeoutMs, 'Firestore ping');
  }

  async has(id: string): Promise<boolean> {
    const snapshot = await withTimeout(
      this.collection.doc(FirestoreSeenStore.docId(id)).get(),
      this.timeoutMs,
      'Firestore read'
    );

    if (!snapshot.exists) {
      return false;
    }

    const expiresAt: unknown = snapshot.get('expiresAt');
    if (expiresAt instanceof admin.firestore.Timestamp && expiresAt.toMillis() <= Date.now()) {
      logger.debug('만료된 중복 기록 무시', { id });
      return false;
    }

    return true;
  }

  async add(id: string): Promise<void> {
    await withTimeout(
      this.collection.doc(FirestoreSeenStore.docId(id)).set({
        itemId: id,
        seenAt: admin.firestore.FieldValue.serverTimestamp(),
        expiresAt: admin.firestore.Timestamp.fromMillis(Date.now() + this.ttlMs),
      }),
      this.timeoutMs,
      'Firestore write'
    );
  }

  /**
   * TTL 정책: 만료된 기록 배치 삭제 (최대 500개씩)
   */
  async prune(): Promise<number> {
    const snapshot = await withTimeout(
      this.collection.where('expiresAt', '<', admin.firestore.Timestamp.now()).get(),
      this.timeoutMs,
      'Firestore prune query'
    );

    if (snapshot.empty) {
      logger.debug('삭제할 만료 기록이 없습니다.');
      return 0;
    }

    const docs = snapshot.docs;
    let deletedCount = 0;

    for (let i = 0; i < docs.length; i += STORE_BATCH_SIZE) {
      const batch = this.collection.firestore.batch();
      const currentBatch = docs.slice(i, i + STORE_BATCH_SIZE);

      currentBatch.forEach(doc => {
        batch.delete(doc.ref);
      });

      await withTimeout(batch.commit(), this.timeoutMs, 'Firestore prune commit');
      deletedCount += currentBatch.length;
      logger.debug(`${deletedCount}/${docs.length}개 삭제 완료`);
    }

    logger.success(`TTL 정책 완료: ${deletedCount}개 만료 기록 삭제`);
    return deletedCount;
  }
}
