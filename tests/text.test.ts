import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import { blockText, extractImages, parsePublishTime, stripAuthorPrefix } from '../src/extractors/text';

describe('parsePublishTime', () => {
  it('reads local date-times at the configured offset', () => {
    expect(parsePublishTime('2024-03-05 08:30', 480)).toBe('2024-03-05T00:30:00.000Z');
    expect(parsePublishTime('2023年7月1日', 480)).toBe('2023-06-30T16:00:00.000Z');
    expect(parsePublishTime('2024/03/05', 0)).toBe('2024-03-05T00:00:00.000Z');
  });

  it('reads epoch seconds and milliseconds', () => {
    expect(parsePublishTime(1700000000, 480)).toBe('2023-11-14T22:13:20.000Z');
    expect(parsePublishTime('1700000000000', 480)).toBe('2023-11-14T22:13:20.000Z');
  });

  it('keeps explicit zones', () => {
    expect(parsePublishTime('2024-03-05T10:00:00+08:00', 0)).toBe('2024-03-05T02:00:00.000Z');
  });

  it('returns null for anything else', () => {
    expect(parsePublishTime('yesterday', 480)).toBeNull();
    expect(parsePublishTime('2024-13-01', 480)).toBeNull();
    expect(parsePublishTime(undefined, 480)).toBeNull();
  });

  it('rejects epochs outside the representable date range', () => {
    expect(parsePublishTime(1e20, 480)).toBeNull();
    expect(parsePublishTime('99999999999999999999', 480)).toBeNull();
  });
});

describe('stripAuthorPrefix', () => {
  it('drops labelled prefixes only', () => {
    expect(stripAuthorPrefix('作者：张三')).toBe('张三');
    expect(stripAuthorPrefix('By Jane Doe')).toBe('Jane Doe');
    expect(stripAuthorPrefix('Byron')).toBe('Byron');
    expect(stripAuthorPrefix('文学家')).toBe('文学家');
  });
});

describe('blockText', () => {
  it('turns blocks into lines and skips scripts', () => {
    const $ = cheerio.load('<div id="c"><p>Hello <b>world</b></p><p>Second&nbsp; line</p><script>track()</script></div>');
    expect(blockText($('#c'))).toBe('Hello world\nSecond line');
  });

  it('breaks lines on <br>', () => {
    const $ = cheerio.load('<section id="c">one<br>two</section>');
    expect(blockText($('#c'))).toBe('one\ntwo');
  });
});

describe('extractImages', () => {
  it('resolves, cleans and deduplicates image sources', () => {
    const $ = cheerio.load(
      '<div id="c"><img data-src="https://img.example.com/a.png?from=appmsg"><img src="/b.png">' +
        '<img src="data:image/png;base64,AAAA"><img data-src="https://img.example.com/a.png"></div>',
    );
    expect(extractImages($, $('#c'), 'https://mp.weixin.qq.com/s/x')).toEqual([
      'https://img.example.com/a.png',
      'https://mp.weixin.qq.com/b.png',
    ]);
  });
});
