import axios from 'axios';
import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { NewsItem } from '../models/news.model';
import type { NewsSource } from '../models/pipeline.model';
import { logger } from '../utils/logger';
import { ProviderError, toProviderError } from '../utils/errors';
import { sleep as defaultSleep, type Sleep } from '../utils/async';
import { truncateText } from '../utils/text';
import {
  NEWS_BACKOFF_INITIAL_SECONDS,
  NEWS_BACKOFF_MAX_SECONDS,
  NEWS_EXCERPT_MAX_LENGTH,
  NEWS_REQUEST_TIMEOUT_MS,
} from '../config/constants';

const PROVIDER = 'cryptopanic';

const postSchema = z
  .object({
    id: z.union([z.number(), z.string()]).nullish(),
    uuid: z.string().nullish(),
    url: z.string().nullish(),
    title: z.string().nullish(),
    body: z.string().nullish(),
    description: z.string().nullish(),
    excerpt: z.string().nullish(),
    published_at: z.string().nullish(),
    created_at: z.string().nullish(),
    domain: z.string().nullish(),
    source: z.object({ title: z.string().nullish(), domain: z.string().nullish() }).nullish(),
  })
  .passthrough();

const responseSchema = z.union([
  z.object({ results: z.array(postSchema).nullish() }).passthrough(),
  z.array(postSchema),
]);

type CryptoPanicPost = z.infer<typeof postSchema>;

export interface CryptoPanicOptions {
  apiKey: string;
  apiUrl: string;
  maxAttempts: number;
  sleep?: Sleep;
}

/**
 * CryptoPanic 뉴스 조회
 * - 429: Retry-After(초)만큼 대기 후 재시도
 * - 5xx/네트워크 오류: 지수 백오프(2초부터 2배씩, 최대 300초) 후 재시도
 * - 그 외 4xx: 즉시 실패
 */
export class CryptoPanicService implements NewsSource {
  private sleep: Sleep;

  constructor(private options: CryptoPanicOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async fetchLatest(limit: number, signal?: AbortSignal): Promise<NewsItem[]> {
    const params = {
      auth_token: this.options.apiKey,
      public: 'true',
      filter: 'news',
      page: 1,
    };

    let backoff = NEWS_BACKOFF_INITIAL_SECONDS;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      signal?.throwIfAborted();

      let wait = backoff;

      try {
        const response = await axios.get<unknown>(this.options.apiUrl, {
          params,
          timeout: NEWS_REQUEST_TIMEOUT_MS,
          validateStatus: () => true,
          signal,
        });

        if (response.status === 429) {
          wait = parseRetryAfter(response.headers['retry-after']) ?? backoff;
          logger.warn(`CryptoPanic 429 Too Many Requests: ${wait}초 대기`, { attempt, maxAttempts: this.options.maxAttempts });
        } else if (response.status >= 500) {
          logger.warn(`CryptoPanic 서버 오류 (HTTP ${response.status}): ${wait}초 후 재시도`, { attempt });
        } else if (response.status >= 400) {
          throw new ProviderError(PROVIDER, `HTTP ${response.status}: ${JSON.stringify(response.data)}`, {
            status: response.status,
          });
        } else {
          const items = this.parse(response.data).slice(0, limit);
          if (items.length === 0) {
            logger.info('CryptoPanic 응답에 뉴스가 없습니다.');
          }
          return items;
        }
      } catch (error) {
        if (error instanceof ProviderError || signal?.aborted) {
          throw error;
        }
        logger.warn(`CryptoPanic 요청 실패: ${toProviderError(PROVIDER, error).message}`, { attempt });
      }

      if (attempt < this.options.maxAttempts) {
        await this.sleep(wait * 1000, signal);
        backoff = Math.min(NEWS_BACKOFF_MAX_SECONDS, backoff * 2);
      }
    }

    throw new ProviderError(PROVIDER, `Exceeded ${this.options.maxAttempts} fetch attempts`);
  }

  /**
   * 응답 JSON → NewsItem 목록 (ID 없는 항목 제외)
   */
  parse(data: unknown): NewsItem[] {
    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(PROVIDER, `Malformed response: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const posts = Array.isArray(parsed.data) ? parsed.data : parsed.data.results ?? [];
    const items: NewsItem[] = [];

    for (const post of posts) {
      const item = toNewsItem(post);
      if (item) {
        items.push(item);
      } else {
        logger.debug('ID 없는 뉴스 스킵', { title: post.title ?? undefined });
      }
    }

    return items;
  }
}

function toNewsItem(post: CryptoPanicPost): NewsItem | null {
  const id = post.id != null && post.id !== '' ? String(post.id) : post.uuid || post.url || '';
  if (!id) {
    return null;
  }

  const published = new Date(post.published_at || post.created_at || Date.now());

  return {
    id,
    title: post.title?.trim() || 'Untitled',
    body: truncateText(stripHtml(post.body || post.description || post.excerpt || ''), NEWS_EXCERPT_MAX_LENGTH),
    url: post.url || '',
    publishedAt: Number.isNaN(published.getTime()) ? new Date() : published,
    source: post.source?.title || post.source?.domain || post.domain || undefined,
  };
}

/**
 * 본문 HTML 태그 제거 및 공백 정리
 */
export function stripHtml(html: string): string {
  if (!html.includes('<')) {
    return html.replace(/\s+/g, ' ').trim();
  }
  return cheerio.load(html).root().text().replace(/\s+/g, ' ').trim();
}

function parseRetryAfter(value: unknown): number | null {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}
