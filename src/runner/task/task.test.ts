import { existsSync } from 'node:fs';
import { mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { Context } from '@/runner/task/context';
import { ConfigError, OperationError, SpawnError } from '@/runner/task/errors';
import { parseProgramSpec } from '@/runner/task/program';
import type { Operation } from '@/runner/task/types';
import { makeTempDir, nodeEval, rmDirWithRetries } from '@/test';

import { runPipeline, Task } from './task';

const run = (code: string): Operation => ({
  kind: 'command',
  run: parseProgramSpec(nodeEval(code)),
});
const touch = (name: string): Operation =>
  run(`require('fs').writeFileSync(${JSON.stringify(name)}, 'x')`);
const recordCwd = (name: string): Operation =>
  run(`require('fs').writeFileSync(${JSON.stringify(name)}, process.cwd())`);

describe('Task', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('task');
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('runs all operations in order and succeeds', async () => {
    const task = new Task('build', [touch('a.txt'), touch('b.txt')]);
    const ctx = new Context(dir);
    expect(await task.run(ctx)).toBe('success');
    expect(existsSync(path.join(dir, 'a.txt'))).toBe(true);
    expect(existsSync(path.join(dir, 'b.txt'))).toBe(true);
    expect(ctx.depth).toBe(0);
  });

  it('stops at the first failure and never runs later operations', async () => {
    const task = new Task('build', [
      touch('a.txt'),
      run('process.exit(1)'),
      touch('c.txt'),
    ]);
    const ctx = new Context(dir);
    expect(await task.run(ctx)).toBe('failure');
    expect(existsSync(path.join(dir, 'a.txt'))).toBe(true);
    expect(existsSync(path.join(dir, 'c.txt'))).toBe(false);
    expect(ctx.depth).toBe(0);
  });

  it('propagates spawn failures as errors, not as a failure outcome', async () => {
    const task = new Task('build', [
      { kind: 'command', run: parseProgramSpec('devrelay-missing-program') },
      touch('after.txt'),
    ]);
    const ctx = new Context(dir);
    const err = await task.run(ctx).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OperationError);
    expect(err instanceof Error && err.message).toBe(
      "failed to run 'command' operation in task 'build'",
    );
    expect(err instanceof Error && err.cause).toBeInstanceOf(SpawnError);
    expect(existsSync(path.join(dir, 'after.txt'))).toBe(false);
    expect(ctx.depth).toBe(0);
  });

  it('scopes set-workdir to the running task', async () => {
    await mkdir(path.join(dir, 'sub'));
    const first = new Task('first', [
      { kind: 'set-workdir', path: 'sub' },
      recordCwd('cwd.txt'),
    ]);
    const second = new Task('second', [recordCwd('cwd.txt')]);
    const ctx = new Context(dir);

    expect(await first.run(ctx)).toBe('success');
    expect(await readFile(path.join(dir, 'sub', 'cwd.txt'), 'utf8')).toBe(
      path.join(dir, 'sub'),
    );

    expect(await second.run(ctx)).toBe('success');
    expect(await readFile(path.join(dir, 'cwd.txt'), 'utf8')).toBe(dir);

    // re-running the same task starts from the base directory again
    expect(await first.run(ctx)).toBe('success');
    expect(ctx.workdir()).toBe(dir);
  });

  it('cancels the running process when aborted and skips the rest', async () => {
    const task = new Task('serve', [
      run('setTimeout(() => {}, 10000)'),
      touch('after.txt'),
    ]);
    const controller = new AbortController();
    const ctx = new Context(dir);
    const started = Date.now();
    const pending = task.run(ctx, controller.signal);
    setTimeout(() => controller.abort(), 200);
    expect(await pending).toBe('failure');
    expect(Date.now() - started).toBeLessThan(8000);
    expect(existsSync(path.join(dir, 'after.txt'))).toBe(false);
  });

  it('does not start anything when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const task = new Task('t', [touch('a.txt')]);
    expect(await task.run(new Context(dir), controller.signal)).toBe('failure');
    expect(existsSync(path.join(dir, 'a.txt'))).toBe(false);
  });

  it('validates operations and names the task and keyword', () => {
    const task = new Task('bad', [
      touch('a.txt'),
      { kind: 'set-workdir', path: ' ' },
    ]);
    expect(() => task.validate()).toThrow(ConfigError);
    expect(() => task.validate()).toThrow(
      "invalid configuration for operation 'set-workdir' in task 'bad'",
    );
    expect(() => new Task('good', [touch('a.txt')]).validate()).not.toThrow();
  });
});

describe('runPipeline', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('pipeline');
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('runs tasks in order and stops at the first failing task', async () => {
    const tasks = [
      new Task('one', [touch('one.txt')]),
      new Task('two', [run('process.exit(2)')]),
      new Task('three', [touch('three.txt')]),
    ];
    expect(await runPipeline(tasks, new Context(dir))).toBe('failure');
    expect(existsSync(path.join(dir, 'one.txt'))).toBe(true);
    expect(existsSync(path.join(dir, 'three.txt'))).toBe(false);
  });

  it('succeeds for an empty pipeline', async () => {
    expect(await runPipeline([], new Context(dir))).toBe('success');
  });
});
