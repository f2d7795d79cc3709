import fs from 'fs/promises';
import { createHash, timingSafeEqual } from 'node:crypto';
import type { ServerConfig } from '../config/index.js';
import { ConfigError } from '../config/index.js';

/**
 * Shared secrets, read once at startup: rotating them requires a restart.
 */
export interface Secrets {
  // Signs the WOPI access tokens
  wopisecret: string;
  // Presented by the IOP when opening files
  iopsecret: string;
}

async function readSecretFile(filePath: string, key: string): Promise<string> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read security.${key}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  const secret = content.trimEnd();
  if (secret.length === 0) {
    throw new ConfigError(`security.${key} points to an empty file`, [filePath]);
  }
  return secret;
}

export async function loadSecrets(security: ServerConfig['security']): Promise<Secrets> {
  return {
    wopisecret: await readSecretFile(security.wopisecretfile, 'wopisecretfile'),
    iopsecret: await readSecretFile(security.iopsecretfile, 'iopsecretfile'),
  };
}

/**
 * Constant-time comparison; both sides are hashed first so lengths always match.
 */
export function secretsMatch(presented: string, expected: string): boolean {
  const a = createHash('sha256').update(presented).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}
