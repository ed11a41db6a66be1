import { AxiosHeaders, type AxiosResponse } from 'axios';
import type { GeneratedImage, ImagePrompt, NewsItem, Post, Summary } from '../src/models/news.model';
import type { ImageGenerator, NewsSource, Publisher, Summarizer } from '../src/models/pipeline.model';

export function makeItem(id: string, overrides: Partial<NewsItem> = {}): NewsItem {
  return {
    id,
    title: `Title ${id}`,
    body: `Body of ${id}`,
    url: `https://news.example.com/${id}`,
    publishedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function axiosResponse<T>(data: T, status = 200, headers: Record<string, string> = {}): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: String(status),
    headers,
    config: { headers: new AxiosHeaders() },
  };
}

export class FakeSource implements NewsSource {
  calls = 0;

  constructor(public items: NewsItem[] | Error) {}

  async fetchLatest(limit: number): Promise<NewsItem[]> {
    this.calls++;
    if (this.items instanceof Error) {
      throw this.items;
    }
    return this.items.slice(0, limit);
  }
}

export class FakeSummarizer implements Summarizer {
  calls: string[] = [];
  failFor = new Set<string>();

  async summarize(item: NewsItem): Promise<Summary> {
    this.calls.push(item.id);
    if (this.failFor.has(item.id)) {
      throw new Error(`summarizer down for ${item.id}`);
    }
    return { summary: `Summary of ${item.id}`, caption: `Caption ${item.id}`, imagePrompt: { scene: item.title } };
  }
}

export class FakeImageGenerator implements ImageGenerator {
  calls: ImagePrompt[] = [];
  fail = false;

  async generate(prompt: ImagePrompt): Promise<GeneratedImage> {
    this.calls.push(prompt);
    if (this.fail) {
      throw new Error('image model down');
    }
    return { kind: 'url', url: 'https://img.example.com/1.png' };
  }
}

export class FakePublisher implements Publisher {
  posts: Post[] = [];
  failFor = new Set<string>();

  get publishedIds(): string[] {
    return this.posts.map(post => post.item.id);
  }

  async publish(post: Post): Promise<number> {
    if (this.failFor.has(post.item.id)) {
      throw new Error(`telegram rejected ${post.item.id}`);
    }
    this.posts.push(post);
    return this.posts.length;
  }
}
