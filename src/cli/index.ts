#!/usr/bin/env node

import chalk from 'chalk';
import { buildTree, resolve, isGroup, DEFAULT_COMMAND, type CommandNode } from './tree.js';
import { errorMessage, SetupCancelledError } from '../lib/errors.js';
import { VERSION } from './version.js';

function printTree(nodes: CommandNode[], indent = ''): void {
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    const last = i === nodes.length - 1;
    const connector = last ? '└─' : '├─';
    const hint = node.hint ? `  ${chalk.dim(node.hint)}` : '';

    console.log(`${indent}${connector} ${node.key}${hint}`);

    if (isGroup(node)) {
      printTree(node.children, indent + (last ? '   ' : '│  '));
    }
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const tree = buildTree();

  if (args[0] === '--version' || args[0] === '-V') {
    console.log(VERSION);
    return;
  }

  if (args[0] === '--help' || args[0] === '-h' || args[0] === 'help') {
    console.log(`\n  tandem v${VERSION}\n`);
    console.log('  Usage: tandem [command]\n');
    printTree(tree, '  ');
    console.log('');
    return;
  }

  // No args → up
  const route = args.length === 0 ? DEFAULT_COMMAND : args;
  const result = resolve(tree, route);

  if (!result) {
    console.error(`  Unknown command: ${args.join(' ')}`);
    console.error('  Run "tandem help" for available commands.');
    process.exit(1);
  }

  const { node, remaining } = result;

  if (isGroup(node)) {
    const path = route.slice(0, route.length - remaining.length).join(' ');
    console.log(`\n  tandem ${path}\n`);
    printTree(node.children, '  ');
    console.log('');
    return;
  }

  await node.action(remaining);
}

main().catch((err) => {
  if (err instanceof SetupCancelledError) {
    console.error(chalk.yellow(err.message));
    process.exit(130);
  }
  console.error(chalk.red(errorMessage(err)));
  process.exit(1);
});
