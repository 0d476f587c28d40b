/**
 * Gateway shared secret, generated once per installation and reused on every run,
 * so the synthesized config stays stable between launches.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { hasErrorCode } from '../lib/errors.js';

const TOKEN_BYTES = 24;

export function generateToken(): string {
  return crypto.randomBytes(TOKEN_BYTES).toString('hex');
}

export async function loadOrCreateToken(file: string): Promise<string> {
  try {
    const existing = (await fs.readFile(file, 'utf-8')).trim();
    if (existing) return existing;
  } catch (err) {
    if (!hasErrorCode(err, 'ENOENT')) throw err;
  }

  const token = generateToken();
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, token + '\n', { encoding: 'utf-8', mode: 0o600 });
  return token;
}
