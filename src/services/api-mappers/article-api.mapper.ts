import { ArticleRecord } from '../../types/crawl';

export interface ArticleCreateRequest {
  url: string;
  title: string;
  author?: string;
  accountName?: string;
  publishTime?: string;
  content: string;
  images: string[];
  coverImage?: string;
  readCount: number;
  likeCount: number;
  rawContentRef?: string;
  crawlTime: string;
  extractedBy: string;
}

export function mapArticleRecordToApiRequest(record: ArticleRecord): ArticleCreateRequest {
  const title = record.title.trim();

  return {
    url: record.url,
    title: title.length > 0 ? title : 'Untitled article',
    author: record.author?.trim() || undefined,
    accountName: record.accountName?.trim() || undefined,
    publishTime: record.publishTime ?? undefined,
    content: record.content,
    images: record.images.filter((image) => image.trim().length > 0),
    coverImage: record.coverImage ?? undefined,
    readCount: Math.max(0, Math.floor(record.readCount)),
    likeCount: Math.max(0, Math.floor(record.likeCount)),
    rawContentRef: record.rawContentRef ?? undefined,
    crawlTime: record.crawlTime,
    extractedBy: record.extractedBy,
  };
}
