import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { HttpError, getErrorStatus } from '../errors/http-error';
import { ArticleStore } from '../repositories/article.repository';
import { ArticleRecord, SaveOutcome } from '../types/crawl';
import { logger } from '../utils/logger';
import { ArticleCreateRequest, mapArticleRecordToApiRequest } from './api-mappers/article-api.mapper';

export interface StorageApiOptions {
  baseUrl: string;
  timeoutMs?: number;
  adapter?: AxiosRequestConfig['adapter'];
}

const existsResponseSchema = z.object({ exists: z.boolean() });

function describeError(error: unknown): string {
  if (error && typeof error === 'object' && 'response' in error) {
    const response = error.response;
    if (response && typeof response === 'object' && 'data' in response) {
      const data = response.data;
      if (data && typeof data === 'object') {
        if ('message' in data && typeof data.message === 'string') return data.message;
        if ('error' in data && typeof data.error === 'string') return data.error;
      }
    }
  }
  return error instanceof Error ? error.message : 'Unknown error';
}

/** Remote article storage over HTTP. */
export class StorageApiService implements ArticleStore {
  private readonly client: AxiosInstance;

  constructor(options: StorageApiOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'Content-Type': 'application/json',
      },
      adapter: options.adapter,
    });

    logger.info('StorageApiService initialized', { baseUrl: options.baseUrl });
  }

  async save(record: ArticleRecord): Promise<SaveOutcome> {
    const request: ArticleCreateRequest = mapArticleRecordToApiRequest(record);

    try {
      const response = await this.client.post('/articles', request);
      if (response.status === 200 || response.status === 201) {
        logger.debug('Article stored via storage API', { url: request.url });
        return 'success';
      }
      logger.warn('Storage API returned unexpected status', { url: request.url, status: response.status });
      return 'error';
    } catch (error) {
      const status = getErrorStatus(error);
      if (status === 409) {
        logger.debug('Storage API reported duplicate', { url: request.url });
        return 'duplicate';
      }

      logger.error('Failed to store article via storage API', {
        url: request.url,
        status,
        error: describeError(error),
      });
      return 'error';
    }
  }

  async exists(url: string): Promise<boolean> {
    try {
      const response = await this.client.get('/articles/exists', { params: { url } });
      const parsed = existsResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new HttpError('Malformed exists response from storage API', response.status, response.data);
      }
      return parsed.data.exists;
    } catch (error) {
      if (error instanceof HttpError) throw error;
      const message = describeError(error);
      throw new HttpError(`Storage API exists check failed: ${message}`, getErrorStatus(error));
    }
  }
}
