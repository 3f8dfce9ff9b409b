import { createHash } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger';

/** Keeps fetched markup around so failed extractions can be diagnosed offline. */
export interface RawContentStore {
  put(url: string, content: string): Promise<string>;
  get(ref: string): Promise<string | undefined>;
}

function contentKey(url: string): string {
  return createHash('sha1').update(url).digest('hex');
}

export class InMemoryRawContentStore implements RawContentStore {
  private readonly entries = new Map<string, string>();

  async put(url: string, content: string): Promise<string> {
    const ref = `memory://${contentKey(url)}`;
    this.entries.set(ref, content);
    return ref;
  }

  async get(ref: string): Promise<string | undefined> {
    return this.entries.get(ref);
  }

  get size(): number {
    return this.entries.size;
  }
}

export class FileRawContentStore implements RawContentStore {
  private readonly directory: string;
  private ready: Promise<string | undefined> | null = null;

  constructor(directory: string) {
    this.directory = path.resolve(process.cwd(), directory);
  }

  async put(url: string, content: string): Promise<string> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.directory, { recursive: true });
    }
    await this.ready;

    const file = path.join(this.directory, `${contentKey(url)}.html`);
    await fs.writeFile(file, content, 'utf-8');
    logger.debug('Raw content stored', { url, file });
    return file;
  }

  async get(ref: string): Promise<string | undefined> {
    try {
      return await fs.readFile(ref, 'utf-8');
    } catch (error) {
      logger.warn('Raw content not readable', { ref, error: error instanceof Error ? error.message : String(error) });
      return undefined;
    }
  }
}
