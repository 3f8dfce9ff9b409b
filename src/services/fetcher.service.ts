import * as cheerio from 'cheerio';
import markers from '../data/markers.json';
import {
  DetectionError,
  PermanentFetchError,
  TransientFetchError,
  classifyFetchError,
} from '../errors/crawl-errors';
import { FetchPlan, FetchedPage, RawPage, SessionHandle } from '../types/crawl';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/wait';
import { SessionPool } from './session-pool.service';

export interface FetcherOptions {
  timeoutMs: number;
  detectionMarkers?: readonly string[];
  removalMarkers?: readonly string[];
}

// verification interstitials are short; long bodies only get the title/URL check
const SHORT_PAGE_CHARS = 3000;

function visibleText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript, template').remove();
  return $('body').text().replace(/\s+/g, ' ').trim();
}

function findMarker(haystack: string, candidates: readonly string[]): string | undefined {
  const lower = haystack.toLowerCase();
  return candidates.find((marker) => lower.includes(marker.toLowerCase()));
}

/**
 * Turns a rendered page into either a usable page or a typed failure:
 * detection interstitials are transient, not-found and removal notices are permanent.
 */
export function inspectPage(
  raw: RawPage,
  requestedUrl: string,
  detectionMarkers: readonly string[] = markers.detectionMarkers,
  removalMarkers: readonly string[] = markers.removalMarkers,
): void {
  if (raw.status === 404 || raw.status === 410) {
    throw new PermanentFetchError(`HTTP ${raw.status} for ${requestedUrl}`, 'not-found');
  }

  const text = visibleText(raw.html);

  const detected =
    findMarker(raw.finalUrl, detectionMarkers) ??
    findMarker(raw.title, detectionMarkers) ??
    (text.length < SHORT_PAGE_CHARS ? findMarker(text, detectionMarkers) : undefined);
  if (detected) {
    throw new DetectionError(detected, requestedUrl);
  }
  if (raw.status === 403) {
    throw new DetectionError('HTTP 403', requestedUrl);
  }

  const removed = findMarker(raw.title, removalMarkers) ?? findMarker(text, removalMarkers);
  if (removed) {
    throw new PermanentFetchError(`Content removed (${removed}) at ${requestedUrl}`, 'removed');
  }

  if (raw.status === 429 || raw.status >= 500) {
    throw new TransientFetchError(`HTTP ${raw.status} for ${requestedUrl}`, 'navigation');
  }
}

export class Fetcher {
  constructor(
    private readonly pool: SessionPool,
    private readonly options: FetcherOptions,
  ) {}

  async fetch(
    handle: SessionHandle,
    url: string,
    plan: FetchPlan,
    signal?: AbortSignal,
  ): Promise<FetchedPage> {
    const session = this.pool.sessionFor(handle);
    const startedAt = Date.now();

    let raw: RawPage;
    try {
      raw = await withTimeout(
        (timeoutSignal) => session.load(url, plan, timeoutSignal),
        this.options.timeoutMs,
        () => new TransientFetchError(`Fetch of ${url} exceeded ${this.options.timeoutMs}ms`, 'timeout'),
        signal,
      );
    } catch (error) {
      throw classifyFetchError(error);
    }

    inspectPage(raw, url, this.options.detectionMarkers, this.options.removalMarkers);

    logger.debug('Page fetched', {
      url,
      finalUrl: raw.finalUrl,
      status: raw.status,
      sessionId: handle.contextId,
      durationMs: Date.now() - startedAt,
    });

    return {
      ...raw,
      requestedUrl: url,
      sessionId: handle.contextId,
      proxyId: handle.proxyId,
      fetchedAt: new Date().toISOString(),
    };
  }
}
