/**
 * Host process table, looked up by executable file name.
 *
 * Name matching is the only identity available for processes tandem did not
 * start itself: two different executables sharing a file name are
 * indistinguishable here.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { fileName } from '../lib/path.js';
import { hasErrorCode } from '../lib/errors.js';

const execFileAsync = promisify(execFile);

const LIST_TIMEOUT_MS = 10_000;
/** Linux truncates /proc/<pid>/comm to 15 characters */
const LINUX_COMM_LENGTH = 15;

export interface ProcessEntry {
  pid: number;
  name: string;
}

export interface ProcessTable {
  /** Every live process whose image name matches the executable's file name */
  find(executableName: string): Promise<ProcessEntry[]>;
  isAlive(pid: number): boolean;
  /** Returns false when the process had already exited */
  kill(pid: number, signal?: NodeJS.Signals): boolean;
}

/** Parse `ps -A -o pid= -o comm=` output */
export function parsePsOutput(stdout: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of stdout.split('\n')) {
    const match = /^\s*(\d+)\s+(.+?)\s*$/.exec(line);
    if (!match) continue;
    entries.push({ pid: Number(match[1]), name: match[2] });
  }
  return entries;
}

/** Parse `tasklist /FO CSV /NH` output: `"image.exe","1234","Console",...` */
export function parseTasklistOutput(stdout: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const match = /^"([^"]+)","(\d+)"/.exec(line.trim());
    if (!match) continue;
    entries.push({ pid: Number(match[2]), name: match[1] });
  }
  return entries;
}

export function matchesExecutable(
  entryName: string,
  executableName: string,
  platform: NodeJS.Platform = process.platform,
): boolean {
  if (platform === 'win32') {
    return entryName.toLowerCase() === executableName.toLowerCase();
  }
  const base = fileName(entryName);
  if (base === executableName) return true;
  return platform === 'linux'
    && base.length === LINUX_COMM_LENGTH
    && executableName.length > LINUX_COMM_LENGTH
    && executableName.startsWith(base);
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: exists but owned by someone else
    return hasErrorCode(err, 'EPERM');
  }
}

export class HostProcessTable implements ProcessTable {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  async find(executableName: string): Promise<ProcessEntry[]> {
    const entries = this.platform === 'win32'
      ? await this.listWindows(executableName)
      : await this.listPosix();
    return entries.filter((e) => e.pid !== process.pid && matchesExecutable(e.name, executableName, this.platform));
  }

  isAlive(pid: number): boolean {
    return isProcessAlive(pid);
  }

  kill(pid: number, signal: NodeJS.Signals = 'SIGKILL'): boolean {
    try {
      process.kill(pid, signal);
      return true;
    } catch (err) {
      if (hasErrorCode(err, 'ESRCH')) return false;
      throw err;
    }
  }

  private async listPosix(): Promise<ProcessEntry[]> {
    const { stdout } = await execFileAsync('ps', ['-A', '-o', 'pid=', '-o', 'comm='], {
      timeout: LIST_TIMEOUT_MS,
      maxBuffer: 8 * 1024 * 1024,
    });
    return parsePsOutput(stdout);
  }

  private async listWindows(executableName: string): Promise<ProcessEntry[]> {
    const { stdout } = await execFileAsync(
      'tasklist',
      ['/FI', `IMAGENAME eq ${executableName}`, '/FO', 'CSV', '/NH'],
      { timeout: LIST_TIMEOUT_MS, windowsHide: true },
    );
    return parseTasklistOutput(stdout);
  }
}
