import { describe, it, expect } from 'vitest';
import { parsePsOutput, parseTasklistOutput, matchesExecutable, HostProcessTable } from './table.js';

describe('parsePsOutput', () => {
  it('reads pid and command columns', () => {
    const stdout = '    1 systemd\n  812 llama-server\n 9001 /usr/local/bin/agent-gateway\n';
    expect(parsePsOutput(stdout)).toEqual([
      { pid: 1, name: 'systemd' },
      { pid: 812, name: 'llama-server' },
      { pid: 9001, name: '/usr/local/bin/agent-gateway' },
    ]);
  });

  it('keeps spaces inside command names', () => {
    expect(parsePsOutput(' 42 Google Chrome Helper\n')).toEqual([{ pid: 42, name: 'Google Chrome Helper' }]);
  });

  it('skips blank and malformed lines', () => {
    expect(parsePsOutput('\nPID COMMAND\n')).toEqual([]);
  });
});

describe('parseTasklistOutput', () => {
  it('reads image name and pid from CSV rows', () => {
    const stdout = [
      '"llama-server.exe","4120","Console","1","1,204,332 K"',
      '"llama-server.exe","5000","Console","1","12 K"',
    ].join('\r\n');
    expect(parseTasklistOutput(stdout)).toEqual([
      { pid: 4120, name: 'llama-server.exe' },
      { pid: 5000, name: 'llama-server.exe' },
    ]);
  });

  it('returns nothing for the no-match notice', () => {
    expect(parseTasklistOutput('INFO: No tasks are running which match the specified criteria.\r\n')).toEqual([]);
  });
});

describe('matchesExecutable', () => {
  it('matches the bare command name', () => {
    expect(matchesExecutable('llama-server', 'llama-server', 'linux')).toBe(true);
  });

  it('matches a full path by its file name', () => {
    expect(matchesExecutable('/opt/llama/llama-server', 'llama-server', 'darwin')).toBe(true);
  });

  it('matches a linux comm truncated to 15 characters', () => {
    expect(matchesExecutable('agent-gateway-x', 'agent-gateway-xy', 'linux')).toBe(true);
  });

  it('does not treat a short prefix as truncation', () => {
    expect(matchesExecutable('llama', 'llama-server', 'linux')).toBe(false);
  });

  it('ignores case on windows only', () => {
    expect(matchesExecutable('LLAMA-SERVER.EXE', 'llama-server.exe', 'win32')).toBe(true);
    expect(matchesExecutable('LLAMA-SERVER', 'llama-server', 'linux')).toBe(false);
  });
});

describe('HostProcessTable', () => {
  const table = new HostProcessTable();

  it('reports the current process as alive', () => {
    expect(table.isAlive(process.pid)).toBe(true);
  });

  it('reports an unused pid as gone', () => {
    expect(table.isAlive(2 ** 22 + 12345)).toBe(false);
  });

  it('kill returns false for a process that already exited', () => {
    expect(table.kill(2 ** 22 + 12345)).toBe(false);
  });
});
