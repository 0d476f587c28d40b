/**
 * Gateway configuration synthesis.
 * Renders the gateway's JSON config from preferences plus fixed constants;
 * the same inputs always produce byte-identical text.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileName, toForwardSlashes } from '../lib/path.js';
import { hasErrorCode } from '../lib/errors.js';
import type { Preferences } from './preferences.js';
import type { Settings } from './settings.js';

export const PROVIDER_ID = 'llamacpp';
export const PLACEHOLDER_API_KEY = 'sk-local';
export const LOOPBACK_HOST = '127.0.0.1';

export interface SynthesisConstants {
  backendPort: number;
  gatewayPort: number;
  contextSize: number;
  maxTokens: number;
  maxConcurrent: number;
  token: string;
}

export interface ModelDescriptor {
  id: string;
  name: string;
  reasoning: boolean;
  input: string[];
  contextWindow: number;
  maxTokens: number;
}

export interface ProviderEntry {
  baseUrl: string;
  apiKey: string;
  api: 'openai-completions';
  models: ModelDescriptor[];
}

export interface GatewayConfig {
  messages: { ackReactionScope: string };
  models: {
    mode: 'merge';
    providers: Record<string, ProviderEntry>;
  };
  agents: {
    defaults: {
      model: { primary: string };
      maxConcurrent: number;
      workspace: string;
    };
  };
  gateway: {
    mode: 'local';
    bind: 'loopback';
    port: number;
    auth: { mode: 'token'; token: string };
    tailscale: { mode: 'off' };
  };
}

export function synthesisConstants(settings: Settings, token: string): SynthesisConstants {
  return {
    backendPort: settings.backendPort,
    gatewayPort: settings.gatewayPort,
    contextSize: settings.contextSize,
    maxTokens: settings.maxTokens,
    maxConcurrent: settings.maxConcurrent,
    token,
  };
}

/** "D:\m\phi-3.gguf" → "phi-3.gguf" */
export function deriveModelName(modelFilePath: string): string {
  return fileName(modelFilePath);
}

/** Always `<providerId>/<modelName>` */
export function primaryModelRef(modelFilePath: string): string {
  return `${PROVIDER_ID}/${deriveModelName(modelFilePath)}`;
}

export function buildGatewayConfig(prefs: Preferences, constants: SynthesisConstants): GatewayConfig {
  const modelName = deriveModelName(prefs.modelFilePath);

  return {
    messages: { ackReactionScope: 'group-mentions' },
    models: {
      mode: 'merge',
      providers: {
        [PROVIDER_ID]: {
          baseUrl: `http://${LOOPBACK_HOST}:${constants.backendPort}/v1`,
          apiKey: PLACEHOLDER_API_KEY,
          api: 'openai-completions',
          models: [
            {
              id: modelName,
              name: modelName,
              reasoning: false,
              input: ['text'],
              contextWindow: constants.contextSize,
              maxTokens: constants.maxTokens,
            },
          ],
        },
      },
    },
    agents: {
      defaults: {
        model: { primary: `${PROVIDER_ID}/${modelName}` },
        maxConcurrent: constants.maxConcurrent,
        workspace: toForwardSlashes(prefs.workspaceDirectory),
      },
    },
    gateway: {
      mode: 'local',
      bind: 'loopback',
      port: constants.gatewayPort,
      auth: { mode: 'token', token: constants.token },
      tailscale: { mode: 'off' },
    },
  };
}

export function renderGatewayConfig(prefs: Preferences, constants: SynthesisConstants): string {
  return JSON.stringify(buildGatewayConfig(prefs, constants), null, 2) + '\n';
}

export interface WriteResult {
  path: string;
  /** False when the file already held exactly this text */
  changed: boolean;
}

/**
 * Write the config via temp file + rename, so a crash mid-write never leaves
 * a truncated file behind for the gateway to read.
 */
export async function writeGatewayConfig(file: string, text: string): Promise<WriteResult> {
  let previous: string | null = null;
  try {
    previous = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (!hasErrorCode(err, 'ENOENT')) throw err;
  }

  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  await fs.writeFile(tmp, text, 'utf-8');
  await fs.rename(tmp, file);

  return { path: file, changed: previous !== text };
}
