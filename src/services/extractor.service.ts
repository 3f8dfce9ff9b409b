import * as cheerio from 'cheerio';
import markers from '../data/markers.json';
import { ExtractionFailure, errorMessage } from '../errors/crawl-errors';
import { ArticleDraft, EXTRACTION_CHAIN, ExtractionStrategy } from '../extractors/strategies';
import { readPayloadMeta } from '../extractors/payload';
import { parsePublishTime } from '../extractors/text';
import { RawContentStore } from '../repositories/raw-content.repository';
import { ArticleRecord, EmbeddedPayloads, ExtractionStrategyName } from '../types/crawl';
import { canonicalizeUrl, stripTracking } from '../utils/url';
import { logger } from '../utils/logger';

export type ExtractionResult =
  | { ok: true; record: ArticleRecord }
  | { ok: false; failure: ExtractionFailure };

export interface ArticleExtractorOptions {
  rawStore: RawContentStore;
  timezoneOffsetMinutes: number;
  errorTitles?: readonly string[];
  strategies?: readonly ExtractionStrategy[];
  now?: () => Date;
}

type CompleteDraft = ArticleDraft & { title: string; content: string };

function isComplete(draft: ArticleDraft | null): draft is CompleteDraft {
  return Boolean(draft?.title && draft.content);
}

export class ArticleExtractor {
  private readonly strategies: readonly ExtractionStrategy[];
  private readonly errorTitles: string[];
  private readonly now: () => Date;

  constructor(private readonly options: ArticleExtractorOptions) {
    this.strategies = options.strategies ?? EXTRACTION_CHAIN;
    this.errorTitles = (options.errorTitles ?? markers.errorTitles).map((title) => title.toLowerCase());
    this.now = options.now ?? (() => new Date());
  }

  async extract(content: string, payloads: EmbeddedPayloads, url: string): Promise<ExtractionResult> {
    const articleUrl = canonicalizeUrl(url) ?? url;
    const $ = cheerio.load(content);
    const meta = readPayloadMeta(payloads, content);

    let winner: { name: ExtractionStrategyName; draft: CompleteDraft } | null = null;
    for (const strategy of this.strategies) {
      let draft: ArticleDraft | null;
      try {
        draft = strategy.extract({ $, url: articleUrl, meta });
      } catch (error) {
        logger.warn('Extraction strategy threw', { url: articleUrl, strategy: strategy.name, error: errorMessage(error) });
        continue;
      }
      if (isComplete(draft)) {
        winner = { name: strategy.name, draft };
        break;
      }
    }

    const rawContentRef = await this.keepRaw(articleUrl, content);

    if (!winner) {
      return this.fail('No extraction strategy yielded both title and body', articleUrl, rawContentRef);
    }

    const { name, draft } = winner;
    if (this.errorTitles.includes(draft.title.trim().toLowerCase())) {
      return this.fail(`Error page title "${draft.title}"`, articleUrl, rawContentRef);
    }

    const offset = this.options.timezoneOffsetMinutes;
    const images = draft.images;
    const cover = meta.coverImage ?? draft.coverImage ?? images[0];

    const record: ArticleRecord = {
      url: articleUrl,
      title: draft.title,
      author: draft.author ?? meta.author ?? null,
      accountName: draft.accountName ?? meta.accountName ?? null,
      publishTime: parsePublishTime(draft.publishTime, offset) ?? parsePublishTime(meta.publishTime, offset),
      content: draft.content,
      images,
      coverImage: cover ? stripTracking(cover, articleUrl) : null,
      readCount: meta.readCount ?? 0,
      likeCount: meta.likeCount ?? 0,
      rawContentRef,
      crawlTime: this.now().toISOString(),
      extractedBy: name,
    };

    logger.debug('Article extracted', { url: articleUrl, strategy: name, images: images.length });
    return { ok: true, record };
  }

  private fail(message: string, url: string, rawContentRef: string | null): ExtractionResult {
    logger.warn('Extraction failed', { url, reason: message, rawContentRef });
    return { ok: false, failure: new ExtractionFailure(message, url, rawContentRef) };
  }

  private async keepRaw(url: string, content: string): Promise<string | null> {
    try {
      return await this.options.rawStore.put(url, content);
    } catch (error) {
      logger.warn('Failed to keep raw content', { url, error: errorMessage(error) });
      return null;
    }
  }
}
