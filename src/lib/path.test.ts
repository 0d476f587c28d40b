import { describe, it, expect } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import { expandTilde, fileName, toForwardSlashes } from './path.js';

const home = os.homedir();

describe('expandTilde', () => {
  it('expands bare ~ to homedir', () => {
    expect(expandTilde('~')).toBe(home);
  });

  it('expands ~/path to homedir/path', () => {
    expect(expandTilde('~/models/a.gguf')).toBe(path.join(home, 'models/a.gguf'));
  });

  it('leaves absolute paths unchanged', () => {
    expect(expandTilde('/opt/tandem')).toBe('/opt/tandem');
  });
});

describe('fileName', () => {
  it('takes the last segment of a windows path', () => {
    expect(fileName('D:\\m\\phi-3.gguf')).toBe('phi-3.gguf');
  });

  it('takes the last segment of a posix path', () => {
    expect(fileName('/usr/local/bin/llama-server')).toBe('llama-server');
  });

  it('ignores a trailing separator', () => {
    expect(fileName('/srv/models/')).toBe('models');
  });

  it('returns the input when there is no separator', () => {
    expect(fileName('agent-gateway.exe')).toBe('agent-gateway.exe');
  });

  it('returns empty string for empty input', () => {
    expect(fileName('')).toBe('');
  });
});

describe('toForwardSlashes', () => {
  it('rewrites backslashes', () => {
    expect(toForwardSlashes('C:\\clawd')).toBe('C:/clawd');
  });

  it('leaves forward slashes alone', () => {
    expect(toForwardSlashes('/home/me/clawd')).toBe('/home/me/clawd');
  });
});
