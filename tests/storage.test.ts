import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { HttpError } from '../src/errors/http-error';
import { InMemoryArticleRepository } from '../src/repositories/article.repository';
import { StorageApiService } from '../src/services/storage-api.service';
import { ArticleRecord } from '../src/types/crawl';
import { articleUrl } from './helpers/fake-site';

function record(overrides: Partial<ArticleRecord> = {}): ArticleRecord {
  return {
    url: articleUrl('stored'),
    title: '  Stored article ',
    author: null,
    accountName: 'Test Account',
    publishTime: '2024-03-05T00:30:00.000Z',
    content: 'Body',
    images: ['https://img.example.com/a.png', ' '],
    coverImage: null,
    readCount: 12.7,
    likeCount: -1,
    rawContentRef: null,
    crawlTime: '2024-06-01T00:00:00.000Z',
    extractedBy: 'pattern',
    ...overrides,
  };
}

type Handler = (config: InternalAxiosRequestConfig) => { status: number; data: unknown };

function fakeApi(handler: Handler) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    requests.push(config);
    const { status, data } = handler(config);
    const response: AxiosResponse = { status, statusText: String(status), data, headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, null, response);
    }
    return response;
  };
  return { requests, service: new StorageApiService({ baseUrl: 'http://storage.test/api', adapter }) };
}

describe('StorageApiService', () => {
  it('posts the mapped record', async () => {
    const { requests, service } = fakeApi(() => ({ status: 201, data: { id: 1 } }));

    await expect(service.save(record())).resolves.toBe('success');

    expect(requests[0].method).toBe('post');
    expect(requests[0].url).toBe('/articles');
    const body: unknown = typeof requests[0].data === 'string' ? JSON.parse(requests[0].data) : requests[0].data;
    expect(body).toMatchObject({
      url: articleUrl('stored'),
      title: 'Stored article',
      images: ['https://img.example.com/a.png'],
      readCount: 12,
      likeCount: 0,
      extractedBy: 'pattern',
    });
  });

  it('reports conflicts as duplicates and other failures as errors', async () => {
    const conflict = fakeApi(() => ({ status: 409, data: { message: 'exists' } }));
    await expect(conflict.service.save(record())).resolves.toBe('duplicate');

    const broken = fakeApi(() => ({ status: 500, data: { error: 'db down' } }));
    await expect(broken.service.save(record())).resolves.toBe('error');
  });

  it('checks existence', async () => {
    const { requests, service } = fakeApi((config) => ({
      status: 200,
      data: { exists: config.params?.url === articleUrl('stored') },
    }));

    await expect(service.exists(articleUrl('stored'))).resolves.toBe(true);
    await expect(service.exists(articleUrl('other'))).resolves.toBe(false);
    expect(requests[0].url).toBe('/articles/exists');
  });

  it('raises HttpError on malformed or failed existence checks', async () => {
    const malformed = fakeApi(() => ({ status: 200, data: { found: true } }));
    await expect(malformed.service.exists(articleUrl('stored'))).rejects.toThrow(
      'Malformed exists response from storage API',
    );

    const failing = fakeApi(() => ({ status: 503, data: { message: 'maintenance' } }));
    const error = await failing.service.exists(articleUrl('stored')).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.status).toBe(503);
      expect(error.message).toBe('Storage API exists check failed: maintenance');
    }
  });
});

describe('InMemoryArticleRepository', () => {
  it('keeps one record per canonical URL', async () => {
    const repository = new InMemoryArticleRepository();

    await expect(repository.save(record())).resolves.toBe('success');
    await expect(repository.save(record({ url: `${articleUrl('stored')}?scene=1` }))).resolves.toBe('duplicate');
    await expect(repository.save(record({ url: 'not a url' }))).resolves.toBe('error');

    expect(repository.size).toBe(1);
    await expect(repository.exists(`${articleUrl('stored')}#rd`)).resolves.toBe(true);
    await expect(repository.exists(articleUrl('missing'))).resolves.toBe(false);
  });
});
