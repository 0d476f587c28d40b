import { createLogger, type Logger } from '../lib/logger.js';
import type { ManagedProcess, ProcessSupervisor } from './supervisor.js';

export interface StoppedProcess {
  name: string;
  killed: number;
}

export type ShutdownReport =
  | { action: 'stopped'; processes: StoppedProcess[] }
  | { action: 'left-running'; processes: string[] };

/**
 * Ends a session. Managed processes are only killed when the operator
 * confirmed; otherwise they stay up for the next `tandem up` to adopt.
 */
export class ShutdownCoordinator {
  private readonly log: Logger;

  constructor(
    private readonly supervisor: ProcessSupervisor,
    private readonly processes: ManagedProcess[],
    log?: Logger,
  ) {
    this.log = log ?? createLogger('shutdown');
  }

  async shutdown(confirmed: boolean): Promise<ShutdownReport> {
    if (!confirmed) {
      this.log.debug('leaving managed processes running');
      return { action: 'left-running', processes: this.processes.map((p) => p.name) };
    }

    const stopped: StoppedProcess[] = [];
    for (const proc of this.processes) {
      const killed = await this.supervisor.stop(proc);
      stopped.push({ name: proc.name, killed });
    }
    return { action: 'stopped', processes: stopped };
  }
}
