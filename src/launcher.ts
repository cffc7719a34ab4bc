import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { config } from './config.js';

/**
 * A command line that re-enters this program, e.g. `node dist/cli/index.js`.
 */
export interface Launcher {
  command: string;
  args: string[];
}

const projectRoot = path.resolve(fileURLToPath(new URL('.', import.meta.url)), '..');
const distEntry = path.join(projectRoot, 'dist', 'cli', 'index.js');
const srcEntry = path.join(projectRoot, 'src', 'cli', 'index.ts');
const tsxBinary = path.join(projectRoot, 'node_modules', '.bin', 'tsx');

/**
 * Work out how a forced command or a hook should start this program. The built
 * entry is preferred; a source checkout falls back to tsx.
 */
export function resolveLauncher(): Launcher {
  const override = config.launcher.entryOverride;
  if (override) {
    return { command: override, args: [] };
  }
  if (fs.existsSync(distEntry)) {
    return { command: process.execPath, args: [distEntry] };
  }
  return { command: tsxBinary, args: [srcEntry] };
}

/**
 * Quote a word for a POSIX shell. Plain words pass through unchanged.
 */
export function shellQuote(word: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

export interface ShellCommand {
  env?: Record<string, string>;
  launcher: Launcher;
  verb: string;
}

/**
 * Serialize `[VAR=value ...] <launcher> <verb>` for a shell, quoting every word.
 */
export function renderShellCommand({ env = {}, launcher, verb }: ShellCommand): string {
  const assignments = Object.entries(env).map(([name, value]) => `${name}=${shellQuote(value)}`);
  const words = [launcher.command, ...launcher.args, verb].map(shellQuote);
  return [...assignments, ...words].join(' ');
}
