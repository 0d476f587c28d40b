/**
 * Orchestrator settings: fixed constants with an optional settings.json override.
 * Ports and sizes here feed both the launch arguments and the synthesized gateway config.
 */

import { promises as fs } from 'node:fs';
import { z } from 'zod';
import { ConfigError, hasErrorCode } from '../lib/errors.js';

const port = z.number().int().min(1).max(65535);
const positiveInt = z.number().int().positive();

export const SettingsSchema = z.object({
  backendPort: port.default(8080),
  gatewayPort: port.default(18789),
  contextSize: positiveInt.default(4096),
  maxTokens: positiveInt.default(2048),
  maxConcurrent: positiveInt.default(1),
  requestTimeoutMs: positiveInt.default(120_000),
  readinessTimeoutMs: positiveInt.default(120_000),
}).strict();

export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

/**
 * Load settings.json. Returns defaults when the file is missing.
 * Invalid JSON or out-of-range values throw a ConfigError naming the field.
 */
export async function loadSettings(file: string): Promise<Settings> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return DEFAULT_SETTINGS;
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${file}: not valid JSON`, { cause: err });
  }

  const parsed = SettingsSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`${file}: ${issues}`);
  }
  if (parsed.data.backendPort === parsed.data.gatewayPort) {
    throw new ConfigError(`${file}: backendPort and gatewayPort must differ`);
  }
  return parsed.data;
}
