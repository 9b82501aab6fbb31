import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { ScriptNotFoundError } from '../../src/core/scriptGenerator.js';
import { runReplayInSubprocess, streamLines } from '../../src/core/subprocess.js';

describe('streamLines', () => {
  it('prefixes each line and strips trailing whitespace', async () => {
    const lines: string[] = [];

    await streamLines(
      Readable.from(['Launching chromium browser...\nStep 1 ', 'ok\r\n', 'last line']),
      'stdout',
      (line) => lines.push(line),
    );

    expect(lines).toEqual([
      'stdout: Launching chromium browser...',
      'stdout: Step 1 ok',
      'stdout: last line',
    ]);
  });

  it('reports a missing stream', async () => {
    const lines: string[] = [];

    await streamLines(null, 'stderr', (line) => lines.push(line));

    expect(lines).toEqual(['stderr: (No stream available)']);
  });

  it('drains two streams concurrently', async () => {
    const lines: string[] = [];
    const sink = (line: string): void => {
      lines.push(line);
    };

    await Promise.all([
      streamLines(Readable.from(['a\nb\n']), 'stdout', sink),
      streamLines(Readable.from(['c\n']), 'stderr', sink),
    ]);

    expect([...lines].sort()).toEqual(['stderr: c', 'stdout: a', 'stdout: b']);
  });
});

describe('runReplayInSubprocess', () => {
  it('streams both pipes and resolves to the exit code', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'replay-sub-'));
    const scriptPath = path.join(dir, 'replay.json');
    await writeFile(scriptPath, '{}');
    const lines: string[] = [];

    try {
      const code = await runReplayInSubprocess(scriptPath, {
        headless: false,
        sink: (line) => lines.push(line),
        command: {
          file: process.execPath,
          args: ['-e', "console.log('a'); console.error('b'); process.exitCode = 3;"],
        },
      });

      expect(code).toBe(3);
      expect([...lines].sort()).toEqual(['stderr: b', 'stdout: a']);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('refuses to start without a script file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'replay-sub-'));
    try {
      await expect(
        runReplayInSubprocess(path.join(dir, 'missing.json'), { headless: true }),
      ).rejects.toBeInstanceOf(ScriptNotFoundError);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
