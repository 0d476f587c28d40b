import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import {
  loadContext,
  preparePreferences,
  backendLaunchArguments,
  gatewayLaunchArguments,
  managedProcesses,
  synthesizeGatewayConfig,
  backendHealthUrl,
  gatewayBaseUrl,
  createChatClient,
  withInstanceLock,
  type RuntimeContext,
} from './context.js';
import { DEFAULT_SETTINGS } from '../config/settings.js';
import type { Preferences } from '../config/preferences.js';
import type { AskFn } from '../config/onboard.js';
import { InstanceLock } from './lock.js';

const prefs: Preferences = {
  backendExecutablePath: '/opt/llama/llama-server',
  modelFilePath: '/models/phi-3.gguf',
  gatewayExecutablePath: '/opt/gateway/agent-gateway',
  workspaceDirectory: '/home/me/work',
};

describe('runtime context', () => {
  let dataDir: string;
  let ctx: RuntimeContext;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tandem-ctx-'));
    ctx = await loadContext({ TANDEM_HOME: dataDir });
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('resolves paths under TANDEM_HOME with default settings and a token', async () => {
    expect(ctx.paths.dataDir).toBe(dataDir);
    expect(ctx.settings).toEqual(DEFAULT_SETTINGS);
    expect(ctx.token).toMatch(/^[0-9a-f]{48}$/);
    expect(await fs.readFile(path.join(dataDir, 'gateway.token'), 'utf-8')).toBe(`${ctx.token}\n`);
  });

  it('reuses the token on the next load', async () => {
    const again = await loadContext({ TANDEM_HOME: dataDir });
    expect(again.token).toBe(ctx.token);
  });

  it('builds the backend arguments from model and settings', () => {
    expect(backendLaunchArguments(prefs, DEFAULT_SETTINGS)).toEqual([
      '-m', '/models/phi-3.gguf', '-c', '4096', '--port', '8080', '--host', '127.0.0.1',
    ]);
  });

  it('passes the absolute config path to the gateway', () => {
    expect(gatewayLaunchArguments('/data/gateway.json')).toEqual([path.resolve('/data/gateway.json')]);
  });

  it('describes both managed processes', () => {
    const { backend, gateway } = managedProcesses(ctx, prefs);
    expect(backend.executableName).toBe('llama-server');
    expect(backend.logFile).toBe(path.join(dataDir, 'logs', 'backend.log'));
    expect(gateway.executableName).toBe('agent-gateway');
    expect(gateway.launchArguments).toEqual([path.join(dataDir, 'gateway.json')]);
    expect(gateway.logFile).toBe(path.join(dataDir, 'logs', 'gateway.log'));
  });

  it('prompts for missing preferences and saves all four', async () => {
    await fs.writeFile(
      ctx.paths.preferencesFile,
      'backend_path=/opt/llama/llama-server\nmodel_path=/models/phi-3.gguf\n',
    );
    const asked: string[] = [];
    const ask: AskFn = async (field) => {
      asked.push(field);
      return field === 'gatewayExecutablePath' ? '"/opt/gateway/agent-gateway"' : '/home/me/work';
    };

    expect(await preparePreferences(ctx, ask)).toEqual(prefs);
    expect(asked).toEqual(['gatewayExecutablePath', 'workspaceDirectory']);
    expect(await fs.readFile(ctx.paths.preferencesFile, 'utf-8')).toBe(
      'backend_path=/opt/llama/llama-server\n'
        + 'model_path=/models/phi-3.gguf\n'
        + 'gateway_path=/opt/gateway/agent-gateway\n'
        + 'workspace_dir=/home/me/work\n',
    );
  });

  it('writes the gateway config and reports when it is unchanged', async () => {
    expect((await synthesizeGatewayConfig(ctx, prefs)).changed).toBe(true);
    expect((await synthesizeGatewayConfig(ctx, prefs)).changed).toBe(false);

    const written: unknown = JSON.parse(await fs.readFile(ctx.paths.gatewayConfigFile, 'utf-8'));
    expect(written).toMatchObject({
      agents: { defaults: { model: { primary: 'llamacpp/phi-3.gguf' } } },
      gateway: { port: 18789, auth: { mode: 'token', token: ctx.token } },
    });
  });

  it('points the readiness checks and the chat client at loopback', () => {
    expect(backendHealthUrl(DEFAULT_SETTINGS)).toBe('http://127.0.0.1:8080/health');
    expect(gatewayBaseUrl(DEFAULT_SETTINGS)).toBe('http://127.0.0.1:18789/');
    expect(createChatClient(ctx, prefs).url).toBe('http://127.0.0.1:18789/v1/chat/completions');
  });

  it('runs under the instance lock and releases it afterwards', async () => {
    const result = await withInstanceLock(ctx, async () => 'done');
    expect(result).toBe('done');
    await expect(fs.stat(ctx.paths.lockFile)).resolves.toBeDefined();

    const lock = new InstanceLock(ctx.paths.lockFile);
    expect(await lock.acquire()).toBeNull();
    lock.release();
  });

  it('refuses to run while another live process holds the lock', async () => {
    const other = new InstanceLock(ctx.paths.lockFile, { host: os.hostname(), pid: process.ppid });
    await other.acquire();
    try {
      await expect(withInstanceLock(ctx, async () => 'never')).rejects.toThrow(
        /^Another tandem instance is running \(PID \d+, since .+\)\.$/,
      );
    } finally {
      other.release();
    }
  });
});
