/**
 * Path helpers that treat both separators alike, so Windows-style paths
 * stored in preferences behave the same on every host.
 */

import path from 'node:path';
import os from 'node:os';

/** Expand leading ~ to homedir so paths like ~/dev/foo resolve correctly. */
export function expandTilde(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** Final segment of a path split on `/` or `\`: "D:\m\phi-3.gguf" → "phi-3.gguf" */
export function fileName(p: string): string {
  const segments = p.split(/[\\/]+/).filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : '';
}

/** Rewrite every backslash as a forward slash: "C:\clawd" → "C:/clawd" */
export function toForwardSlashes(p: string): string {
  return p.replace(/\\/g, '/');
}
