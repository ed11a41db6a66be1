import type { GeneratedImage, ImagePrompt, NewsItem, Post, Summary } from './news.model';

export interface NewsSource {
  fetchLatest(limit: number, signal?: AbortSignal): Promise<NewsItem[]>;
}

export interface Summarizer {
  summarize(item: NewsItem): Promise<Summary>;
}

export interface ImageGenerator {
  generate(prompt: ImagePrompt): Promise<GeneratedImage>;
}

export interface Publisher {
  /** 전송된 메시지 ID 반환 */
  publish(post: Post): Promise<number>;
}

export type PipelineStage = 'summarize' | 'image' | 'publish';

export interface ItemFailure {
  itemId: string;
  stage: PipelineStage;
  message: string;
}

export interface PassReport {
  fetched: number;
  skipped: number;
  posted: number;
  failures: ItemFailure[];
  aborted: boolean;
}
