import { GoogleGenerativeAI, type Part } from '@google/generative-ai';
import type { GeneratedImage, ImagePrompt } from '../models/news.model';
import type { ImageGenerator } from '../models/pipeline.model';
import { logger } from '../utils/logger';
import { ProviderError, toProviderError } from '../utils/errors';
import { IMAGE_PROMPT_LOG_LENGTH, LLM_REQUEST_TIMEOUT_MS } from '../config/constants';

const PROVIDER = 'gemini';

export interface ImageGeneratorOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

/**
 * Gemini 이미지 생성
 */
export class ImageGeneratorService implements ImageGenerator {
  private genAI: GoogleGenerativeAI;
  private model: string;
  private timeoutMs: number;

  constructor(options: ImageGeneratorOptions) {
    this.genAI = new GoogleGenerativeAI(options.apiKey);
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? LLM_REQUEST_TIMEOUT_MS;
  }

  async generate(prompt: ImagePrompt): Promise<GeneratedImage> {
    const promptText = flattenPrompt(prompt);
    logger.info(`Gemini 이미지 요청: ${promptText.slice(0, IMAGE_PROMPT_LOG_LENGTH)}`);

    // responseModalities는 SDK 타입에 없어서 리터럴이 아닌 변수로 전달
    const generationConfig = {
      candidateCount: 1,
      responseModalities: ['Text', 'Image'],
    };

    let parts: Part[];

    try {
      const model = this.genAI.getGenerativeModel(
        { model: this.model, generationConfig },
        { timeout: this.timeoutMs }
      );
      const response = await model.generateContent({
        contents: [{ role: 'user', parts: [{ text: promptText }] }],
      });
      parts = response.response.candidates?.[0]?.content?.parts ?? [];
    } catch (error) {
      throw toProviderError(PROVIDER, error);
    }

    const image = extractImage(parts);
    if (!image) {
      throw new ProviderError(PROVIDER, 'Response contained no image');
    }
    return image;
  }
}

/**
 * {style, scene} 형태의 프롬프트를 "style: ... | scene: ..." 문자열로 변환
 */
export function flattenPrompt(prompt: ImagePrompt): string {
  if (typeof prompt === 'string') {
    return prompt;
  }
  return Object.entries(prompt)
    .map(([key, value]) => `${key}: ${value}`)
    .join(' | ');
}

/**
 * 응답 파트에서 이미지 추출 (inlineData 우선, data URI 텍스트도 허용)
 */
export function extractImage(parts: Part[]): GeneratedImage | null {
  for (const part of parts) {
    if (part.inlineData?.data) {
      return {
        kind: 'bytes',
        data: Buffer.from(part.inlineData.data, 'base64'),
        mimeType: part.inlineData.mimeType || 'image/png',
      };
    }

    const text = part.text?.trim();
    const match = text ? /^data:(image\/[\w.+-]+);base64,(.+)$/s.exec(text) : null;
    if (match) {
      return { kind: 'bytes', data: Buffer.from(match[2], 'base64'), mimeType: match[1] };
    }
  }
  return null;
}
