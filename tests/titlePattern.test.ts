import { describe, expect, it } from 'vitest';
import { isSeriesSibling, parseTitlePattern } from '../src/crawlers/titlePattern';

describe('parseTitlePattern', () => {
  it('reads hash, ordinal and date markers', () => {
    expect(parseTitlePattern('Weekly Digest #12')).toMatchObject({ kind: 'number', value: 12 });
    expect(parseTitlePattern('机器学习入门 第十二讲')).toMatchObject({ kind: 'number', value: 12 });
    expect(parseTitlePattern('早报 2024-03-05')).toMatchObject({ kind: 'date', value: 20240305 });
  });

  it('ignores titles without a usable prefix or number', () => {
    expect(parseTitlePattern('A1')).toBeNull();
    expect(parseTitlePattern('Hello world')).toBeNull();
  });
});

describe('isSeriesSibling', () => {
  it('matches the same series at another position', () => {
    const reference = parseTitlePattern('Weekly Digest #12');
    expect(isSeriesSibling(reference, 'Weekly Digest #13')).toBe(true);
    expect(isSeriesSibling(reference, 'weekly digest # 11')).toBe(true);
    expect(isSeriesSibling(reference, 'Weekly Digest #12')).toBe(false);
    expect(isSeriesSibling(reference, 'Monthly Digest #13')).toBe(false);
  });

  it('matches Chinese ordinals and dates', () => {
    expect(isSeriesSibling(parseTitlePattern('机器学习入门 第三讲'), '机器学习入门 第十二讲')).toBe(true);
    expect(isSeriesSibling(parseTitlePattern('早报 2024-03-05'), '早报 2024-03-06')).toBe(true);
    expect(isSeriesSibling(parseTitlePattern('Go Basics Part 1'), 'Go Basics Part 2')).toBe(true);
  });

  it('never matches without a reference', () => {
    expect(isSeriesSibling(null, 'Weekly Digest #13')).toBe(false);
  });
});
