import Anthropic from '@anthropic-ai/sdk';
import type { ImagePrompt, NewsItem, Summary } from '../models/news.model';
import type { Summarizer } from '../models/pipeline.model';
import { logger } from '../utils/logger';
import { ProviderError, toProviderError } from '../utils/errors';
import { truncateText } from '../utils/text';
import {
  CAPTION_MAX_LENGTH,
  LLM_REQUEST_TIMEOUT_MS,
  SUMMARY_FALLBACK_MAX_LENGTH,
  SUMMARY_MAX_TOKENS,
  SUMMARY_TEMPERATURE,
} from '../config/constants';

const PROVIDER = 'anthropic';

const SYSTEM_PROMPT =
  'You are a concise crypto news editor. Output ONLY valid JSON with three keys: ' +
  '"summary" (2-3 sentence factual summary), "caption" (<=120 chars), and "image_prompt" ' +
  '(an object with keys style, scene, elements, restrictions).';

export interface SummarizerOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

export class SummarizerService implements Summarizer {
  private anthropic: Anthropic;
  private model: string;

  constructor(options: SummarizerOptions) {
    this.anthropic = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? LLM_REQUEST_TIMEOUT_MS,
    });
    this.model = options.model;
  }

  /**
   * 뉴스 한 건을 요약하고 캡션/이미지 프롬프트 생성
   */
  async summarize(item: NewsItem): Promise<Summary> {
    let responseText: string;

    try {
      const message = await this.anthropic.messages.create({
        model: this.model,
        max_tokens: SUMMARY_MAX_TOKENS,
        temperature: SUMMARY_TEMPERATURE,
        system: SYSTEM_PROMPT,
        messages: [
          {
            role: 'user',
            content: buildUserPrompt(item)
          }
        ]
      });

      const first = message.content[0];
      responseText = first && first.type === 'text' ? first.text.trim() : '';
    } catch (error) {
      throw toProviderError(PROVIDER, error);
    }

    if (!responseText) {
      throw new ProviderError(PROVIDER, 'Empty completion');
    }

    logger.debug(`Claude API 응답: ${responseText}`, { id: item.id });
    return parseSummary(responseText, item);
  }
}

export function buildUserPrompt(item: NewsItem): string {
  return `Title: ${item.title}
URL: ${item.url}

Excerpt: ${item.body}

Return JSON exactly like: {"summary":"...","caption":"...","image_prompt":{"style":"","scene":"","elements":"","restrictions":""}}`;
}

/**
 * 모델 응답 파싱
 * 1. 전체를 JSON으로 파싱
 * 2. 실패하면 첫 '{'부터 마지막 '}'까지 잘라서 파싱 (```json 등 앞뒤 텍스트 제거)
 * 3. 그래도 실패하면 응답 텍스트를 그대로 요약으로 사용
 */
export function parseSummary(text: string, item: NewsItem): Summary {
  const json = tryParseObject(text) ?? tryParseObject(extractObject(text));

  if (!json) {
    logger.warn('Claude 응답이 JSON이 아닙니다. 응답 텍스트를 요약으로 사용합니다.', { id: item.id });
    return {
      summary: truncateText(text, SUMMARY_FALLBACK_MAX_LENGTH),
      caption: truncateText(item.title, CAPTION_MAX_LENGTH),
      imagePrompt: { scene: item.title },
    };
  }

  const summary = typeof json.summary === 'string' && json.summary.trim() ? json.summary.trim() : item.title;
  const caption = typeof json.caption === 'string' && json.caption.trim() ? json.caption.trim() : item.title;

  return {
    summary,
    caption: truncateText(caption, CAPTION_MAX_LENGTH),
    imagePrompt: toImagePrompt(json.image_prompt, item.title),
  };
}

function extractObject(text: string): string {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  return start !== -1 && end > start ? text.slice(start, end + 1) : '';
}

function tryParseObject(text: string): Record<string, unknown> | null {
  if (!text) {
    return null;
  }
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

function toImagePrompt(value: unknown, title: string): ImagePrompt {
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }

  if (isRecord(value)) {
    const prompt: Record<string, string> = {};
    for (const [key, field] of Object.entries(value)) {
      if (typeof field === 'string' && field.trim()) {
        prompt[key] = field.trim();
      } else if (Array.isArray(field)) {
        const joined = field.filter((part): part is string => typeof part === 'string').join(', ');
        if (joined) prompt[key] = joined;
      }
    }
    if (Object.keys(prompt).length > 0) {
      return prompt;
    }
  }

  return { scene: title };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
