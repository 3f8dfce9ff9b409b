import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { ExtractionStrategyName } from '../types/crawl';
import { PayloadMeta } from './payload';
import {
  blockText,
  extractImages,
  firstAttr,
  firstText,
  normalizeWhitespace,
  stripAuthorPrefix,
} from './text';

export interface ExtractionInput {
  $: CheerioAPI;
  url: string;
  meta: PayloadMeta;
}

/** What one strategy could read. Title and content are both required for a win. */
export interface ArticleDraft {
  title?: string;
  content?: string;
  author?: string;
  accountName?: string;
  publishTime?: string | number;
  images: string[];
  coverImage?: string;
}

export interface ExtractionStrategy {
  name: ExtractionStrategyName;
  extract(input: ExtractionInput): ArticleDraft | null;
}

const SEMANTIC_BODY = ['[itemprop="articleBody"]', 'article', 'main', '[role="main"]'];

export const semanticStrategy: ExtractionStrategy = {
  name: 'semantic',
  extract({ $, url }) {
    const body = SEMANTIC_BODY.map((selector) => $(selector).first()).find((node) => node.length > 0);
    if (!body) return null;

    const title =
      firstText($, ['article h1', 'main h1', '[itemprop="headline"]', 'h1']) ??
      firstAttr($, ['meta[property="og:title"]', 'meta[name="twitter:title"]'], 'content');

    const author =
      firstAttr($, ['meta[name="author"]', 'meta[property="article:author"]'], 'content') ??
      firstText($, ['[itemprop="author"] [itemprop="name"]', '[itemprop="author"]', '[rel="author"]']);

    const publishTime =
      firstAttr($, ['meta[property="article:published_time"]', 'meta[itemprop="datePublished"]'], 'content') ??
      firstAttr($, ['time[datetime]', '[itemprop="datePublished"][datetime]'], 'datetime') ??
      firstText($, ['[itemprop="datePublished"]', 'time']);

    return {
      title,
      content: blockText(body) || undefined,
      author: author ? stripAuthorPrefix(author) : undefined,
      accountName: firstAttr($, ['meta[property="og:site_name"]'], 'content'),
      publishTime,
      images: extractImages($, body, url),
      coverImage: firstAttr($, ['meta[property="og:image"]'], 'content'),
    };
  },
};

export const patternStrategy: ExtractionStrategy = {
  name: 'pattern',
  extract({ $, url }) {
    const body = $('#js_content').first().length ? $('#js_content').first() : $('.rich_media_content').first();
    const title = firstText($, ['#activity-name', '.rich_media_title', '#js_text_title']);
    if (!body.length && !title) return null;

    const author = firstText($, ['#js_author_name', '.rich_media_meta_text.rich_media_meta_text_author', '#meta_content .rich_media_meta_text']);

    return {
      title,
      content: body.length ? blockText(body) || undefined : undefined,
      author: author ? stripAuthorPrefix(author) : undefined,
      accountName: firstText($, ['#js_name', '.profile_nickname', '#profileBt a', '.wx_follow_nickname']),
      publishTime: firstText($, ['#publish_time', '.publish_time', '#post-date']),
      images: body.length ? extractImages($, body, url) : [],
    };
  },
};

export const payloadStrategy: ExtractionStrategy = {
  name: 'payload',
  extract({ meta, url }) {
    if (!meta.title && !meta.contentHtml && !meta.contentText) return null;

    let content = meta.contentText ? normalizeWhitespace(meta.contentText) : undefined;
    let images: string[] = [];
    if (meta.contentHtml) {
      const $content = cheerio.load(meta.contentHtml);
      const root = $content.root();
      content = blockText(root) || content;
      images = extractImages($content, root, url);
    }

    return {
      title: meta.title,
      content: content || undefined,
      author: meta.author ? stripAuthorPrefix(meta.author) : undefined,
      accountName: meta.accountName,
      publishTime: meta.publishTime,
      images,
      coverImage: meta.coverImage,
    };
  },
};

/** Tried in order; the first draft carrying both title and content wins. */
export const EXTRACTION_CHAIN: readonly ExtractionStrategy[] = [
  semanticStrategy,
  patternStrategy,
  payloadStrategy,
];
