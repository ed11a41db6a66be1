import axios from 'axios';
import type { Post } from '../models/news.model';
import type { Publisher } from '../models/pipeline.model';
import { logger } from '../utils/logger';
import { ProviderError, describeError, toProviderError } from '../utils/errors';
import {
  TELEGRAM_API_BASE,
  TELEGRAM_CAPTION_MAX_LENGTH,
  TELEGRAM_MESSAGE_MAX_LENGTH,
  TELEGRAM_REQUEST_TIMEOUT_MS,
} from '../config/constants';

const PROVIDER = 'telegram';

export interface TelegramOptions {
  botToken: string;
  chatId: string;
}

export class TelegramService implements Publisher {
  private chatId: string;
  private baseUrl: string;

  constructor(options: TelegramOptions) {
    this.chatId = options.chatId;
    this.baseUrl = `${TELEGRAM_API_BASE}/bot${options.botToken}`;
  }

  /**
   * 뉴스 한 건 전송 (이미지가 있으면 사진 + 캡션, 없으면 텍스트)
   * 텔레그램이 사진을 거부하면 텍스트만 다시 전송
   */
  async publish(post: Post): Promise<number> {
    const { image } = post;

    if (!image) {
      return this.sendMessage(formatPost(post, TELEGRAM_MESSAGE_MAX_LENGTH));
    }

    try {
      const caption = formatPost(post, TELEGRAM_CAPTION_MAX_LENGTH);
      return image.kind === 'bytes'
        ? await this.sendPhotoFile(image.data, image.mimeType, caption)
        : await this.sendPhotoUrl(image.url, caption);
    } catch (error) {
      // 타임아웃/네트워크 오류는 사진이 이미 게시됐을 수 있으므로 텍스트로 재전송하지 않음
      if (!isRejection(error)) {
        throw error;
      }
      logger.warn(`사진 전송 거부, 텍스트만 전송 시도: ${describeError(error)}`, { id: post.item.id });
      return this.sendMessage(formatPost(post, TELEGRAM_MESSAGE_MAX_LENGTH));
    }
  }

  /**
   * 텍스트 메시지 전송
   */
  private async sendMessage(text: string): Promise<number> {
    return this.call('sendMessage', {
      chat_id: this.chatId,
      text,
      parse_mode: 'HTML',
      disable_web_page_preview: false,
    });
  }

  /**
   * 생성된 이미지 업로드 (multipart/form-data)
   */
  private async sendPhotoFile(data: Uint8Array, mimeType: string, caption: string): Promise<number> {
    // Blob에는 ArrayBuffer 기반 복사본 전달
    const bytes = new Uint8Array(data.byteLength);
    bytes.set(data);

    const form = new FormData();
    form.append('chat_id', this.chatId);
    form.append('caption', caption);
    form.append('parse_mode', 'HTML');
    form.append('photo', new Blob([bytes], { type: mimeType }), `news.${extensionFor(mimeType)}`);

    return this.call('sendPhoto', form);
  }

  /**
   * URL 이미지 전송
   */
  private async sendPhotoUrl(photoUrl: string, caption: string): Promise<number> {
    return this.call('sendPhoto', {
      chat_id: this.chatId,
      photo: photoUrl,
      caption,
      parse_mode: 'HTML',
    });
  }

  private async call(method: string, payload: FormData | Record<string, unknown>): Promise<number> {
    let data: unknown;
    let status: number;

    try {
      const response = await axios.post<unknown>(`${this.baseUrl}/${method}`, payload, {
        timeout: TELEGRAM_REQUEST_TIMEOUT_MS,
      });
      data = response.data;
      status = response.status;
    } catch (error) {
      // 텔레그램 API 에러 상세 정보 포함
      throw toProviderError(PROVIDER, error);
    }

    const messageId = readMessageId(data);
    if (messageId === null) {
      throw new ProviderError(PROVIDER, `${method} returned unexpected body: ${JSON.stringify(data)}`, { status });
    }

    logger.debug(`텔레그램 ${method} 완료`, { messageId });
    return messageId;
  }
}

/**
 * 메시지 본문 (HTML 모드)
 *   <b>캡션</b>
 *
 *   요약
 *
 *   🔗 Read more
 * 길이 제한을 넘으면 요약을 잘라서 맞춤
 */
export function formatPost(post: Post, maxLength: number): string {
  const { item, summary } = post;
  const header = `<b>${escapeHtml(summary.caption)}</b>\n\n`;
  const footer = item.url ? `\n\n🔗 <a href="${escapeHtml(item.url)}">Read more</a>` : '';

  let body = escapeHtml(summary.summary);
  const budget = maxLength - header.length - footer.length;

  if (body.length > budget) {
    // 이스케이프 엔티티 중간에서 잘리지 않도록 원문 기준으로 자름
    const chars = Array.from(summary.summary).slice(0, Math.max(0, budget - 3));
    while (chars.length > 0 && escapeHtml(chars.join('')).length + 3 > budget) {
      chars.pop();
    }
    body = escapeHtml(chars.join('').trimEnd()) + '...';
  }

  return header + body + footer;
}

/**
 * HTML 특수문자 이스케이프
 * 텔레그램 HTML 모드에서 필수로 이스케이프해야 하는 문자들
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function extensionFor(mimeType: string): string {
  const subtype = mimeType.split('/')[1] || 'png';
  return subtype === 'jpeg' ? 'jpg' : subtype;
}

/**
 * 텔레그램이 응답을 보내 요청을 거부한 경우 (4xx 또는 ok: false)
 */
function isRejection(error: unknown): boolean {
  return error instanceof ProviderError && error.status !== undefined && error.status < 500;
}

function readMessageId(body: unknown): number | null {
  if (!isRecord(body) || body.ok !== true || !isRecord(body.result)) {
    return null;
  }
  return typeof body.result.message_id === 'number' ? body.result.message_id : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
