import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigError } from '../src/errors/crawl-errors';
import { DEFAULT_CONFIG, createConfig, loadConfig } from '../src/utils/config';
import { parseEnvFile } from '../src/utils/env';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ ...DEFAULT_CONFIG, storageApiUrl: undefined, rawContentDir: undefined });
  });

  it('parses flags, numbers and lists', () => {
    const config = loadConfig({
      WORKER_CONCURRENCY: '5',
      HEADLESS: 'false',
      STRATEGY_HISTORY: 'no',
      BREAKER_THRESHOLD: '0.75',
      CANCEL_MODE: 'drain',
      PROXY_LIST: 'user:test-secret@10.0.0.1:8080, 10.0.0.2:3128',
      ARTICLE_HOSTS: 'MP.weixin.qq.com,example.com',
      STORAGE_API_URL: 'http://localhost:8081/api',
    });

    expect(config.workerConcurrency).toBe(5);
    expect(config.headless).toBe(false);
    expect(config.strategies).toEqual({ series: true, history: false, discover: true });
    expect(config.breakerThreshold).toBe(0.75);
    expect(config.cancelMode).toBe('drain');
    expect(config.proxies).toEqual(['user:test-secret@10.0.0.1:8080', '10.0.0.2:3128']);
    expect(config.articleHosts).toEqual(['mp.weixin.qq.com', 'example.com']);
    expect(config.storageApiUrl).toBe('http://localhost:8081/api');
  });

  it('reads proxies from a file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvester-'));
    const file = path.join(dir, 'proxies.txt');
    fs.writeFileSync(file, '# pool\n10.0.0.3:8080\n\nsocks5://10.0.0.4:1080\n');

    expect(loadConfig({ PROXY_LIST_FILE: file }).proxies).toEqual(['10.0.0.3:8080', 'socks5://10.0.0.4:1080']);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lists every invalid key', () => {
    try {
      loadConfig({ WORKER_CONCURRENCY: '0', HEADLESS: 'maybe' });
      expect.fail('expected a ConfigError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues.map((issue) => issue.split(':')[0]).sort()).toEqual(['HEADLESS', 'WORKER_CONCURRENCY']);
    }
  });
});

describe('createConfig', () => {
  it('merges strategy flags with defaults', () => {
    const config = createConfig({ strategies: { series: true, history: false, discover: true }, maxRetries: 1 });
    expect(config.strategies.history).toBe(false);
    expect(config.maxRetries).toBe(1);
    expect(config.workerConcurrency).toBe(DEFAULT_CONFIG.workerConcurrency);
  });
});

describe('parseEnvFile', () => {
  it('reads key-value lines and strips quotes', () => {
    expect(parseEnvFile('# comment\nPORT=4100\nSTORAGE_API_URL="http://localhost:8081/api?a=b"\n\n')).toEqual({
      PORT: '4100',
      STORAGE_API_URL: 'http://localhost:8081/api?a=b',
    });
  });
});
