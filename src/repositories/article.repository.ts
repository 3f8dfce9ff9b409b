import { ArticleRecord, SaveOutcome } from '../types/crawl';
import { canonicalizeUrl } from '../utils/url';
import { logger } from '../utils/logger';

/** The narrow contract the crawler needs from whatever persists articles. */
export interface ArticleStore {
  save(record: ArticleRecord): Promise<SaveOutcome>;
  exists(url: string): Promise<boolean>;
}

export class InMemoryArticleRepository implements ArticleStore {
  private readonly records = new Map<string, ArticleRecord>();

  async save(record: ArticleRecord): Promise<SaveOutcome> {
    const key = canonicalizeUrl(record.url);
    if (!key) {
      logger.warn('Refusing to store article with invalid URL', { url: record.url });
      return 'error';
    }
    if (this.records.has(key)) {
      return 'duplicate';
    }
    this.records.set(key, { ...record, url: key });
    return 'success';
  }

  async exists(url: string): Promise<boolean> {
    const key = canonicalizeUrl(url);
    return key !== null && this.records.has(key);
  }

  all(): ArticleRecord[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }
}
