import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { generateToken, loadOrCreateToken } from './token.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tandem-token-test-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('generateToken', () => {
  it('returns 48 hex characters', () => {
    expect(generateToken()).toMatch(/^[0-9a-f]{48}$/);
  });

  it('differs between calls', () => {
    expect(generateToken()).not.toBe(generateToken());
  });
});

describe('loadOrCreateToken', () => {
  it('creates the token file on first use', async () => {
    const file = path.join(tmpDir, 'nested', 'gateway.token');
    const token = await loadOrCreateToken(file);
    expect(token).toMatch(/^[0-9a-f]{48}$/);
    expect(await fs.readFile(file, 'utf-8')).toBe(token + '\n');
  });

  it('returns the same token on later loads', async () => {
    const file = path.join(tmpDir, 'gateway.token');
    const first = await loadOrCreateToken(file);
    expect(await loadOrCreateToken(file)).toBe(first);
  });

  it('keeps a token written by hand', async () => {
    const file = path.join(tmpDir, 'gateway.token');
    await fs.writeFile(file, 'test-secret\n');
    expect(await loadOrCreateToken(file)).toBe('test-secret');
  });

  it('replaces an empty token file', async () => {
    const file = path.join(tmpDir, 'gateway.token');
    await fs.writeFile(file, '\n');
    expect(await loadOrCreateToken(file)).toMatch(/^[0-9a-f]{48}$/);
  });
});
