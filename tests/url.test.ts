import { describe, expect, it } from 'vitest';
import { canonicalizeUrl, getQueryParam, isArticleUrl, isListingUrl, stripTracking } from '../src/utils/url';

const HOSTS = ['mp.weixin.qq.com'];

describe('canonicalizeUrl', () => {
  it('normalizes scheme, host, fragment, tracking and parameter order', () => {
    expect(canonicalizeUrl('http://Example.com/path/?b=2&a=1&utm_source=feed&chksm=abc#section')).toBe(
      'https://example.com/path?a=1&b=2',
    );
  });

  it('resolves relative and protocol-relative references', () => {
    expect(canonicalizeUrl('/s/abc', 'https://mp.weixin.qq.com/s/xyz')).toBe('https://mp.weixin.qq.com/s/abc');
    expect(canonicalizeUrl('//mp.weixin.qq.com/s/abc')).toBe('https://mp.weixin.qq.com/s/abc');
  });

  it('maps variants of one article onto the same key', () => {
    const a = canonicalizeUrl('https://mp.weixin.qq.com/s/abc?scene=1&from=timeline#rd');
    const b = canonicalizeUrl('http://MP.WEIXIN.QQ.COM/s/abc');
    expect(a).toBe(b);
  });

  it('keeps reader session parameters on account history pages only', () => {
    const listing = canonicalizeUrl(
      'https://mp.weixin.qq.com/mp/profile_ext?action=home&__biz=MzA5&key=test-key&uin=test-uin&pass_ticket=test-ticket',
    );
    expect(listing && getQueryParam(listing, 'key')).toBe('test-key');
    expect(listing && getQueryParam(listing, 'uin')).toBe('test-uin');
    expect(listing && getQueryParam(listing, 'pass_ticket')).toBe('test-ticket');

    expect(canonicalizeUrl('https://mp.weixin.qq.com/s/abc?key=test-key&uin=test-uin&pass_ticket=test-ticket')).toBe(
      'https://mp.weixin.qq.com/s/abc',
    );
  });

  it('rejects non-navigable values', () => {
    expect(canonicalizeUrl('javascript:void(0)')).toBeNull();
    expect(canonicalizeUrl('mailto:someone@example.com')).toBeNull();
    expect(canonicalizeUrl('ftp://example.com/file')).toBeNull();
    expect(canonicalizeUrl('not a url')).toBeNull();
    expect(canonicalizeUrl('   ')).toBeNull();
  });
});

describe('stripTracking', () => {
  it('keeps functional parameters of asset URLs', () => {
    expect(stripTracking('https://img.example.com/a/640?wx_fmt=jpeg&from=appmsg')).toBe(
      'https://img.example.com/a/640?wx_fmt=jpeg',
    );
  });
});

describe('URL classification', () => {
  it('recognizes article pages on configured hosts', () => {
    expect(isArticleUrl('https://mp.weixin.qq.com/s/abc', HOSTS)).toBe(true);
    expect(isArticleUrl('https://mp.weixin.qq.com/s?mid=2&idx=1', HOSTS)).toBe(true);
    expect(isArticleUrl('https://example.com/s/abc', HOSTS)).toBe(false);
    expect(isArticleUrl('https://mp.weixin.qq.com/mp/profile_ext?action=home', HOSTS)).toBe(false);
  });

  it('recognizes listing pages', () => {
    expect(isListingUrl('https://mp.weixin.qq.com/mp/profile_ext?action=home&__biz=MzA5', HOSTS)).toBe(true);
    expect(isListingUrl('https://mp.weixin.qq.com/mp/profile_ext?action=report', HOSTS)).toBe(false);
    expect(isListingUrl('https://mp.weixin.qq.com/mp/appmsgalbum?album_id=7', HOSTS)).toBe(true);
    expect(isListingUrl('https://mp.weixin.qq.com/s/abc', HOSTS)).toBe(false);
  });

  it('reads query parameters', () => {
    expect(getQueryParam('https://mp.weixin.qq.com/s?__biz=MzA5&mid=1', '__biz')).toBe('MzA5');
    expect(getQueryParam('nope', '__biz')).toBeNull();
  });
});
