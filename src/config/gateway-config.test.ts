import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import {
  buildGatewayConfig,
  renderGatewayConfig,
  writeGatewayConfig,
  deriveModelName,
  primaryModelRef,
  synthesisConstants,
  type SynthesisConstants,
} from './gateway-config.js';
import { DEFAULT_SETTINGS } from './settings.js';
import type { Preferences } from './preferences.js';

const PREFS: Preferences = {
  backendExecutablePath: 'C:\\llama\\llama-server.exe',
  modelFilePath: 'D:\\m\\phi-3.gguf',
  gatewayExecutablePath: 'C:\\gateway\\agent-gateway.exe',
  workspaceDirectory: 'C:\\clawd',
};

const CONSTANTS: SynthesisConstants = synthesisConstants(DEFAULT_SETTINGS, 'test-secret');

describe('deriveModelName', () => {
  it('takes the final segment of a windows path', () => {
    expect(deriveModelName('D:\\m\\phi-3.gguf')).toBe('phi-3.gguf');
  });

  it('takes the final segment of a posix path', () => {
    expect(deriveModelName('/models/qwen/qwen2-7b-q4_k_m.gguf')).toBe('qwen2-7b-q4_k_m.gguf');
  });
});

describe('primaryModelRef', () => {
  it('prefixes the fixed provider id', () => {
    expect(primaryModelRef('/models/phi-3.gguf')).toBe('llamacpp/phi-3.gguf');
  });
});

describe('buildGatewayConfig', () => {
  it('uses the model file name as model id and name', () => {
    const config = buildGatewayConfig(PREFS, CONSTANTS);
    const [model] = config.models.providers.llamacpp.models;
    expect(model.id).toBe('phi-3.gguf');
    expect(model.name).toBe('phi-3.gguf');
  });

  it('references the primary model through the provider id', () => {
    const config = buildGatewayConfig(PREFS, CONSTANTS);
    expect(config.agents.defaults.model.primary).toBe('llamacpp/phi-3.gguf');
  });

  it('renders the workspace with forward slashes', () => {
    const config = buildGatewayConfig(PREFS, CONSTANTS);
    expect(config.agents.defaults.workspace).toBe('C:/clawd');
  });

  it('points the provider at the backend port', () => {
    const config = buildGatewayConfig(PREFS, { ...CONSTANTS, backendPort: 9090 });
    expect(config.models.providers.llamacpp.baseUrl).toBe('http://127.0.0.1:9090/v1');
  });

  it('binds the gateway to loopback with token auth and no tunnel', () => {
    const config = buildGatewayConfig(PREFS, CONSTANTS);
    expect(config.gateway).toEqual({
      mode: 'local',
      bind: 'loopback',
      port: 18789,
      auth: { mode: 'token', token: 'test-secret' },
      tailscale: { mode: 'off' },
    });
  });

  it('registers a single provider with the model limits', () => {
    const config = buildGatewayConfig(PREFS, CONSTANTS);
    expect(Object.keys(config.models.providers)).toEqual(['llamacpp']);
    expect(config.models.providers.llamacpp).toEqual({
      baseUrl: 'http://127.0.0.1:8080/v1',
      apiKey: 'sk-local',
      api: 'openai-completions',
      models: [{
        id: 'phi-3.gguf',
        name: 'phi-3.gguf',
        reasoning: false,
        input: ['text'],
        contextWindow: 4096,
        maxTokens: 2048,
      }],
    });
  });
});

describe('renderGatewayConfig', () => {
  it('is byte-identical for identical inputs', () => {
    const a = renderGatewayConfig(PREFS, CONSTANTS);
    const b = renderGatewayConfig({ ...PREFS }, { ...CONSTANTS });
    expect(a).toBe(b);
  });

  it('produces parseable JSON ending in a newline', () => {
    const text = renderGatewayConfig(PREFS, CONSTANTS);
    expect(text.endsWith('}\n')).toBe(true);
    expect(JSON.parse(text)).toEqual(buildGatewayConfig(PREFS, CONSTANTS));
  });

  it('changes when the token changes', () => {
    const a = renderGatewayConfig(PREFS, CONSTANTS);
    const b = renderGatewayConfig(PREFS, { ...CONSTANTS, token: 'other-secret' });
    expect(a).not.toBe(b);
  });
});

describe('writeGatewayConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tandem-gwconfig-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reports a first write as changed', async () => {
    const file = path.join(tmpDir, 'gateway.json');
    const result = await writeGatewayConfig(file, '{}\n');
    expect(result).toEqual({ path: file, changed: true });
    expect(await fs.readFile(file, 'utf-8')).toBe('{}\n');
  });

  it('reports an identical rewrite as unchanged', async () => {
    const file = path.join(tmpDir, 'gateway.json');
    const text = renderGatewayConfig(PREFS, CONSTANTS);
    await writeGatewayConfig(file, text);
    expect((await writeGatewayConfig(file, text)).changed).toBe(false);
  });

  it('leaves no temp file behind', async () => {
    const file = path.join(tmpDir, 'gateway.json');
    await writeGatewayConfig(file, '{}\n');
    expect(await fs.readdir(tmpDir)).toEqual(['gateway.json']);
  });
});
