import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios from 'axios';
import { CryptoPanicService, stripHtml } from '../src/services/cryptopanic.service';
import { ProviderError } from '../src/utils/errors';
import { axiosResponse } from './helpers';

const API_URL = 'https://cryptopanic.test/api/v1/posts/';

function service(maxAttempts = 3) {
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
  const source = new CryptoPanicService({ apiKey: 'test-cp', apiUrl: API_URL, maxAttempts, sleep });
  return { source, sleep };
}

describe('CryptoPanicService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('maps posts to news items', async () => {
    const get = vi.spyOn(axios, 'get').mockResolvedValueOnce(
      axiosResponse({
        results: [
          {
            id: 101,
            title: 'BTC tops',
            url: 'https://news.example.com/1',
            body: '<p>Bitcoin <b>rallies</b></p>',
            published_at: '2026-01-02T03:04:05Z',
            source: { title: 'CoinDesk', domain: 'coindesk.com' },
          },
          { uuid: 'u-2', title: ' ETH ', description: 'plain   text' },
          { url: 'https://news.example.com/3' },
          { title: 'no id at all' },
        ],
      })
    );
    const { source } = service();

    const items = await source.fetchLatest(10);

    expect(items.map(item => item.id)).toEqual(['101', 'u-2', 'https://news.example.com/3']);
    expect(items[0]).toEqual({
      id: '101',
      title: 'BTC tops',
      body: 'Bitcoin rallies',
      url: 'https://news.example.com/1',
      publishedAt: new Date('2026-01-02T03:04:05Z'),
      source: 'CoinDesk',
    });
    expect(items[1].title).toBe('ETH');
    expect(items[1].body).toBe('plain text');
    expect(items[2].title).toBe('Untitled');

    expect(get).toHaveBeenCalledWith(
      API_URL,
      expect.objectContaining({
        params: { auth_token: 'test-cp', public: 'true', filter: 'news', page: 1 },
        timeout: 20_000,
      })
    );
  });

  it('returns at most the requested number of items', async () => {
    vi.spyOn(axios, 'get').mockResolvedValueOnce(
      axiosResponse({ results: [{ id: 1 }, { id: 2 }, { id: 3 }] })
    );
    const { source } = service();

    const items = await source.fetchLatest(2);

    expect(items.map(item => item.id)).toEqual(['1', '2']);
  });

  it('accepts a bare array body', async () => {
    vi.spyOn(axios, 'get').mockResolvedValueOnce(axiosResponse([{ id: 'x' }]));
    const { source } = service();

    expect((await source.fetchLatest(5)).map(item => item.id)).toEqual(['x']);
  });

  it('honours Retry-After on 429', async () => {
    vi.spyOn(axios, 'get')
      .mockResolvedValueOnce(axiosResponse({}, 429, { 'retry-after': '7' }))
      .mockResolvedValueOnce(axiosResponse({ results: [{ id: 1 }] }));
    const { source, sleep } = service();

    const items = await source.fetchLatest(5);

    expect(items).toHaveLength(1);
    expect(sleep.mock.calls.map(call => call[0])).toEqual([7000]);
  });

  it('backs off exponentially on server errors and network failures', async () => {
    vi.spyOn(axios, 'get')
      .mockResolvedValueOnce(axiosResponse({}, 502))
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(axiosResponse({ results: [] }));
    const { source, sleep } = service(4);

    const items = await source.fetchLatest(5);

    expect(items).toEqual([]);
    expect(sleep.mock.calls.map(call => call[0])).toEqual([2000, 4000]);
  });

  it('fails without retrying on other client errors', async () => {
    const get = vi.spyOn(axios, 'get').mockResolvedValueOnce(axiosResponse({ info: 'Token not found' }, 403));
    const { source, sleep } = service();

    const error = await source.fetchLatest(5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error instanceof ProviderError && error.status).toBe(403);
    expect(get).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after the configured number of attempts', async () => {
    const get = vi.spyOn(axios, 'get').mockResolvedValue(axiosResponse({}, 503));
    const { source, sleep } = service(3);

    await expect(source.fetchLatest(5)).rejects.toThrow('[cryptopanic] Exceeded 3 fetch attempts');
    expect(get).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(call => call[0])).toEqual([2000, 4000]);
  });

  it('rejects a malformed body', async () => {
    vi.spyOn(axios, 'get').mockResolvedValueOnce(axiosResponse('<html>maintenance</html>'));
    const { source } = service();

    await expect(source.fetchLatest(5)).rejects.toBeInstanceOf(ProviderError);
  });
});

describe('stripHtml', () => {
  it('drops tags and collapses whitespace', () => {
    expect(stripHtml('<div>Hello\n  <i>world</i></div>')).toBe('Hello world');
    expect(stripHtml('already   plain')).toBe('already plain');
  });
});
