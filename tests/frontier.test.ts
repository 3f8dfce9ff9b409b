import { describe, expect, it } from 'vitest';
import { Frontier } from '../src/services/frontier';
import { Candidate, CandidateKind } from '../src/types/crawl';
import { HOST, articleUrl } from './helpers/fake-site';

function candidate(url: string, depth: number, kind: CandidateKind = 'article'): Candidate {
  return {
    url,
    kind,
    depth,
    attempts: 0,
    discoveredVia: { strategy: 'discover', parentUrl: null, source: 'test' },
  };
}

describe('Frontier', () => {
  it('admits a canonical URL once', () => {
    const frontier = new Frontier();

    expect(frontier.offer(candidate(articleUrl('a'), 0))).toBe(true);
    expect(frontier.offer(candidate(`${articleUrl('a')}?scene=1#rd`, 1))).toBe(false);
    expect(frontier.offer(candidate('javascript:void(0)', 1))).toBe(false);
    expect(frontier.size).toBe(1);
    expect(frontier.has(`http://MP.weixin.qq.com/s/a`)).toBe(true);
  });

  it('hands out shallow candidates first, keeping discovery order within a depth', () => {
    const frontier = new Frontier();
    frontier.offer(candidate(articleUrl('d2'), 2));
    frontier.offer(candidate(articleUrl('d1-first'), 1));
    frontier.offer(candidate(articleUrl('d1-second'), 1));
    frontier.offer(candidate(articleUrl('d0'), 0));

    const order = [frontier.next(), frontier.next(), frontier.next(), frontier.next()].map((next) => next?.url);
    expect(order).toEqual([articleUrl('d0'), articleUrl('d1-first'), articleUrl('d1-second'), articleUrl('d2')]);
    expect(frontier.next()).toBeUndefined();
  });

  it('lets the caller skip kinds it cannot take', () => {
    const frontier = new Frontier();
    const listing = `${HOST}/mp/profile_ext?action=home&__biz=MzA5`;
    frontier.offer(candidate(articleUrl('a'), 0));
    frontier.offer(candidate(listing, 1, 'listing'));

    expect(frontier.next((kind) => kind === 'listing')?.kind).toBe('listing');
    expect(frontier.size).toBe(1);
  });

  it('tracks redirect aliases and discards the queue', () => {
    const frontier = new Frontier();
    frontier.offer(candidate(articleUrl('a'), 0));
    frontier.offer(candidate(articleUrl('b'), 0));

    expect(frontier.registerAlias(articleUrl('a'))).toBe(false);
    expect(frontier.registerAlias(articleUrl('c'))).toBe(true);
    expect(frontier.offer(candidate(articleUrl('c'), 1))).toBe(false);
    expect(frontier.discard()).toBe(2);
    expect(frontier.size).toBe(0);
    expect(frontier.visitedCount).toBe(3);
  });
});
