/** Command tree: one data structure drives routing and help output */

export interface CommandGroup {
  kind: 'group';
  key: string;
  hint?: string;
  children: CommandNode[];
}

export interface CommandLeaf {
  kind: 'leaf';
  key: string;
  hint: string;
  action: (args: string[]) => Promise<void>;
}

export type CommandNode = CommandGroup | CommandLeaf;

type Command = (args: string[]) => Promise<void>;

export function isGroup(node: CommandNode): node is CommandGroup {
  return node.kind === 'group';
}

// -- Factories --

/** Command modules load lazily so `tandem --version` stays fast */
function leaf(key: string, hint: string, load: () => Promise<Command>): CommandNode {
  return {
    key, kind: 'leaf', hint,
    action: async (args) => { const fn = await load(); await fn(args); },
  };
}

function group(key: string, hint: string, children: CommandNode[]): CommandNode {
  return { key, kind: 'group', hint, children };
}

// -- Tree --

export function buildTree(): CommandNode[] {
  return [
    leaf('up', 'Start everything and chat (default)', async () => (await import('./up.js')).up),
    leaf('chat', 'Chat with the running gateway', async () => (await import('./chat.js')).chat),
    leaf('start', 'Launch backend and gateway, then return', async () => (await import('./start.js')).start),
    leaf('stop', 'Kill backend and gateway (--yes skips the prompt)', async () => (await import('./stop.js')).stop),
    leaf('restart', 'Kill and relaunch with a fresh gateway config', async () => (await import('./restart.js')).restart),
    leaf('status', 'Process and endpoint status', async () => (await import('./status.js')).status),

    group('config', 'Preferences and settings', [
      leaf('show', 'Display preferences, settings and files', async () => (await import('./config.js')).show),
      leaf('edit', 'Change the four paths', async () => (await import('./config.js')).edit),
    ]),
  ];
}

export const DEFAULT_COMMAND = ['up'];

/** Resolve a CLI path like ['config', 'show'] against the tree */
export function resolve(
  nodes: CommandNode[],
  args: string[],
): { node: CommandNode; remaining: string[] } | null {
  if (args.length === 0) return null;

  const [head, ...tail] = args;
  const match = nodes.find((n) => n.key === head);
  if (!match) return null;

  if (isGroup(match) && tail.length > 0) {
    const deeper = resolve(match.children, tail);
    if (deeper) return deeper;
  }

  return { node: match, remaining: tail };
}
