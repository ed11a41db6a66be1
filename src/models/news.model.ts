export interface NewsItem {
  readonly id: string;           // 소스 내 고유 ID (id → uuid → url 순)
  readonly title: string;        // 뉴스 제목
  readonly body: string;         // 본문 발췌 (HTML 제거, 최대 1000자)
  readonly url: string;          // 원문 URL
  readonly publishedAt: Date;    // 발행 시간
  readonly source?: string;      // 출처 (도메인 또는 매체명)
}

/**
 * 이미지 프롬프트: 문자열 또는 style/scene/elements/restrictions 같은 항목별 레코드
 */
export type ImagePrompt = string | Record<string, string>;

export interface Summary {
  summary: string;               // 2-3문장 요약
  caption: string;               // 120자 이내 헤드라인
  imagePrompt: ImagePrompt;
}

export type GeneratedImage =
  | { kind: 'bytes'; data: Uint8Array; mimeType: string }
  | { kind: 'url'; url: string };

export interface Post {
  item: NewsItem;
  summary: Summary;
  image: GeneratedImage | null;
}

/**
 * 한 아이템의 처리 결과 (패스 동안만 존재, 저장하지 않음)
 */
export interface PipelineResult extends Post {
  messageId: number;
}
