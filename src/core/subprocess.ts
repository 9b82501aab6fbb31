import { spawn } from 'node:child_process';
import { access } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

import * as log from '../utils/logger.js';
import { ScriptNotFoundError } from './scriptGenerator.js';

// ── Public types ─────────────────────────────────────────────

export type LineSink = (line: string) => void;

export interface SubprocessOptions {
  headless: boolean;
  cwd?: string;
  /** Where prefixed child output goes; defaults to stdout. */
  sink?: LineSink;
  /** Command used to start the CLI again; defaults to the current process. */
  command?: { file: string; args: readonly string[] };
}

// ── Streaming ────────────────────────────────────────────────

/**
 * Forward every line of `stream` to `sink` as `<prefix>: <line>`.
 * Resolves once the stream ends.
 */
export async function streamLines(
  stream: Readable | null | undefined,
  prefix: string,
  sink: LineSink,
): Promise<void> {
  if (!stream) {
    sink(`${prefix}: (No stream available)`);
    return;
  }

  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  for await (const line of lines) {
    sink(`${prefix}: ${line.trimEnd()}`);
  }
}

function defaultSink(line: string): void {
  process.stdout.write(line + '\n');
}

/** The command that re-enters this CLI, with any loader flags (e.g. tsx) kept. */
export function currentCliCommand(): { file: string; args: string[] } {
  const entry = process.argv[1];
  if (entry === undefined) {
    throw new Error('Cannot determine the CLI entry script to re-run');
  }
  return { file: process.execPath, args: [...process.execArgv, entry] };
}

// ── Runner ───────────────────────────────────────────────────

/**
 * Replay `scriptPath` in a child process. stdout and stderr are drained
 * concurrently so neither pipe can fill up and block the child.
 * Resolves to the child's exit code.
 */
export async function runReplayInSubprocess(
  scriptPath: string,
  options: SubprocessOptions,
): Promise<number> {
  try {
    await access(scriptPath);
  } catch {
    throw new ScriptNotFoundError(scriptPath);
  }

  const command = options.command ?? currentCliCommand();
  const sink = options.sink ?? defaultSink;
  const args = [
    ...command.args,
    'replay',
    scriptPath,
    ...(options.headless ? ['--headless'] : []),
  ];

  log.info(`Replaying ${scriptPath} in a child process...`);
  const child = spawn(command.file, args, {
    cwd: options.cwd ?? process.cwd(),
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  const exited = new Promise<number>((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code, signal) => {
      if (signal) log.warn(`Replay process terminated by ${signal}`);
      resolve(code ?? 1);
    });
  });

  const [code] = await Promise.all([
    exited,
    streamLines(child.stdout, 'stdout', sink),
    streamLines(child.stderr, 'stderr', sink),
  ]);

  return code;
}
