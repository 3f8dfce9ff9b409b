import fs from 'fs';
import path from 'path';
import { logger } from './logger';

let envLoaded = false;

export function parseEnvFile(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const [key, ...rest] = trimmed.split('=');
    const value = rest.join('=').trim().replace(/^(['"])(.*)\1$/, '$2');
    if (key) {
      values[key.trim()] = value;
    }
  }
  return values;
}

export function loadEnv(cwd: string = process.cwd()) {
  if (envLoaded) {
    return;
  }

  const envFile = path.resolve(cwd, '.env');
  if (fs.existsSync(envFile)) {
    const parsed = parseEnvFile(fs.readFileSync(envFile, 'utf-8'));
    for (const [key, value] of Object.entries(parsed)) {
      if (!(key in process.env)) {
        process.env[key] = value;
      }
    }
    logger.info('Environment variables loaded from .env');
  }

  envLoaded = true;
}
