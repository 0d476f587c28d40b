/**
 * Process supervisor. Keeps the backend and gateway running.
 *
 * Identity comes from the handle captured at spawn time. Name lookup in the
 * host process table is only the fallback for adopting instances started
 * outside this session; such instances may carry a stale config and two
 * executables with the same file name cannot be told apart.
 */

import { EventEmitter } from 'node:events';
import { spawn } from 'node:child_process';
import { setTimeout as sleep } from 'node:timers/promises';
import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { createLogger, type Logger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { fileName } from '../lib/path.js';
import { HostProcessTable, type ProcessTable } from './table.js';

export type ProcessState = 'not-started' | 'running' | 'unknown';
export type ProcessOrigin = 'spawned' | 'adopted';
export type EnsureOutcome = 'already-running' | 'adopted' | 'spawned' | 'failed';

export interface ManagedProcessSpec {
  /** Short label, also the log file name: "backend" or "gateway" */
  name: string;
  executablePath: string;
  launchArguments: string[];
  logFile?: string;
  cwd?: string;
}

export interface ManagedProcess extends ManagedProcessSpec {
  readonly executableName: string;
  state: ProcessState;
  pid?: number;
  origin?: ProcessOrigin;
}

export function createManagedProcess(spec: ManagedProcessSpec): ManagedProcess {
  return {
    ...spec,
    launchArguments: [...spec.launchArguments],
    executableName: fileName(spec.executablePath),
    state: 'not-started',
  };
}

export interface SpawnHooks {
  /** Only fires for a child that actually started */
  onExit(pid: number | undefined, code: number | null, signal: NodeJS.Signals | null): void;
  onError(err: Error): void;
}

export interface Spawner {
  /**
   * Launch without waiting for the process to finish. Resolves with the pid
   * once the OS started it; rejects with the launch error otherwise.
   */
  spawn(proc: ManagedProcess, hooks: SpawnHooks): Promise<number | undefined>;
}

/** Fire-and-forget launch: detached, stdin closed, stdout+stderr to the log file */
export class DetachedSpawner implements Spawner {
  async spawn(proc: ManagedProcess, hooks: SpawnHooks): Promise<number | undefined> {
    const logHandle = proc.logFile ? await openLog(proc.logFile) : null;
    const out = logHandle ? logHandle.fd : 'ignore';

    try {
      const child = spawn(proc.executablePath, proc.launchArguments, {
        cwd: proc.cwd,
        detached: true,
        stdio: ['ignore', out, out],
        windowsHide: true,
      });
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', resolve);
        child.once('error', reject);
      });
      child.on('exit', (code, signal) => hooks.onExit(child.pid, code, signal));
      child.on('error', (err) => hooks.onError(err));
      child.unref();
      return child.pid;
    } finally {
      // The child holds its own copy of the descriptor
      await logHandle?.close();
    }
  }
}

async function openLog(file: string): Promise<FileHandle> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  return fs.open(file, 'w');
}

export interface SupervisorOptions {
  table?: ProcessTable;
  spawner?: Spawner;
  log?: Logger;
  /** How long `stop` waits for killed processes to disappear */
  exitTimeoutMs?: number;
}

export class ProcessSupervisor extends EventEmitter {
  private readonly table: ProcessTable;
  private readonly spawner: Spawner;
  private readonly log: Logger;
  private readonly exitTimeoutMs: number;

  constructor(options: SupervisorOptions = {}) {
    super();
    this.table = options.table ?? new HostProcessTable();
    this.spawner = options.spawner ?? new DetachedSpawner();
    this.log = options.log ?? createLogger('supervisor');
    this.exitTimeoutMs = options.exitTimeoutMs ?? 5000;
  }

  /**
   * Make sure the process is running. Never restarts and never spawns a
   * second instance; an adopted process is left exactly as found.
   */
  async ensureRunning(proc: ManagedProcess): Promise<EnsureOutcome> {
    if (proc.state === 'running' && proc.pid !== undefined && this.table.isAlive(proc.pid)) {
      this.log.debug(`${proc.name}: handle alive (PID ${proc.pid})`);
      return 'already-running';
    }

    const found = await this.table.find(proc.executableName);
    if (found.length > 0) {
      proc.state = 'running';
      proc.pid = found[0].pid;
      proc.origin = 'adopted';
      this.log.info(`${proc.name}: ${proc.executableName} already running (PID ${proc.pid}), skipping launch`);
      if (found.length > 1) {
        this.log.warn(`${proc.name}: ${found.length} processes named ${proc.executableName}, adopted PID ${proc.pid}`);
      }
      this.emit('adopted', proc);
      return 'adopted';
    }

    this.log.debug(`${proc.name}: spawning ${proc.executablePath} ${proc.launchArguments.join(' ')}`);
    // Marked running before the await so an early exit hook can override it
    proc.state = 'running';
    proc.pid = undefined;
    proc.origin = 'spawned';
    let pid: number | undefined;
    try {
      pid = await this.spawner.spawn(proc, {
        onExit: (childPid, code, signal) => this.handleExit(proc, childPid, code, signal),
        onError: (err) => this.handleError(proc, err),
      });
    } catch (err) {
      proc.origin = undefined;
      this.handleError(proc, err instanceof Error ? err : new Error(String(err)));
      return 'failed';
    }
    if (proc.state === 'running') proc.pid = pid;
    this.log.info(`${proc.name}: launched ${proc.executableName}${pid !== undefined ? ` (PID ${pid})` : ''}`);
    this.emit('spawned', proc);
    return 'spawned';
  }

  /** Recompute state from the handle, then the process table */
  async refresh(proc: ManagedProcess): Promise<ProcessState> {
    if (proc.pid !== undefined && this.table.isAlive(proc.pid)) {
      proc.state = 'running';
      return proc.state;
    }
    const found = await this.table.find(proc.executableName);
    if (found.length > 0) {
      proc.state = 'running';
      proc.pid = found[0].pid;
      proc.origin = 'adopted';
    } else {
      proc.pid = undefined;
      proc.origin = undefined;
      if (proc.state === 'running') proc.state = 'unknown';
    }
    return proc.state;
  }

  /**
   * Hard kill of the captured handle plus every same-named process in the table.
   * No graceful signal is sent. Returns how many processes were killed.
   */
  async stop(proc: ManagedProcess): Promise<number> {
    const pids = new Set<number>();
    if (proc.pid !== undefined) pids.add(proc.pid);
    for (const entry of await this.table.find(proc.executableName)) pids.add(entry.pid);

    const killed: number[] = [];
    for (const pid of pids) {
      if (this.table.kill(pid, 'SIGKILL')) killed.push(pid);
    }
    for (const pid of killed) {
      if (!(await this.waitForExit(pid))) {
        this.log.warn(`${proc.name}: PID ${pid} still present ${this.exitTimeoutMs}ms after SIGKILL`);
      }
    }

    proc.state = 'not-started';
    proc.pid = undefined;
    proc.origin = undefined;
    this.log.debug(`${proc.name}: killed ${killed.length} process(es)`);
    this.emit('stopped', proc, killed.length);
    return killed.length;
  }

  private async waitForExit(pid: number): Promise<boolean> {
    const deadline = Date.now() + this.exitTimeoutMs;
    while (this.table.isAlive(pid)) {
      if (Date.now() > deadline) return false;
      await sleep(100);
    }
    return true;
  }

  private handleExit(
    proc: ManagedProcess,
    pid: number | undefined,
    code: number | null,
    signal: NodeJS.Signals | null,
  ): void {
    // A later stop/respawn already moved on from this handle
    if (proc.state !== 'running' || (proc.pid !== undefined && proc.pid !== pid)) return;
    proc.state = 'unknown';
    const how = signal ? `signal ${signal}` : `code ${code}`;
    this.log.warn(`${proc.name}: exited with ${how}${proc.logFile ? ` (see ${proc.logFile})` : ''}`);
    this.emit('exit', proc, code, signal);
  }

  private handleError(proc: ManagedProcess, err: Error): void {
    proc.state = 'unknown';
    proc.pid = undefined;
    this.log.error(`${proc.name}: failed to launch ${proc.executablePath}: ${errorMessage(err)}`);
    this.emit('failed', proc, err);
  }
}
