import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigError } from '@/runner/task/errors';
import { Task } from '@/runner/task/task';
import { makeTempDir, nodeEval, rmDirWithRetries } from '@/test';

import { runTasks, selectTasks } from './action';

const touch = (name: string) => ({
  command: nodeEval(`require('fs').writeFileSync(${JSON.stringify(name)}, '')`),
});

describe('selectTasks', () => {
  const tasks = ['css', 'js', 'server'].map((n) => new Task(n, []));

  it('returns every task when no names are given', () => {
    expect(selectTasks(tasks, []).map((t) => t.name)).toEqual(['css', 'js', 'server']);
  });

  it('keeps configuration order regardless of argument order', () => {
    expect(selectTasks(tasks, ['server', 'css']).map((t) => t.name)).toEqual([
      'css',
      'server',
    ]);
  });

  it('names unknown tasks and lists the available ones', () => {
    expect(() => selectTasks(tasks, ['cs'])).toThrow(ConfigError);
    expect(() => selectTasks(tasks, ['cs'])).toThrow(
      "unknown task 'cs' (available: css, js, server)",
    );
    expect(() => selectTasks(tasks, ['a', 'b'])).toThrow(
      "unknown tasks 'a', 'b' (available: css, js, server)",
    );
  });
});

describe('runTasks', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('run');
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  const writeConfig = (tasks: Record<string, unknown[]>) =>
    writeFile(path.join(dir, 'devrelay.json'), JSON.stringify({ tasks }));

  it('runs the selected tasks from the config directory', async () => {
    await writeConfig({ one: [touch('one')], two: [touch('two')] });
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    expect(await runTasks(dir, ['two'])).toBe('success');
    expect(existsSync(path.join(dir, 'one'))).toBe(false);
    expect(existsSync(path.join(dir, 'two'))).toBe(true);
    expect(log).toHaveBeenCalledWith('devrelay: finished 1 task(s)');
    log.mockRestore();
  });

  it('reports failure when a task fails', async () => {
    await writeConfig({
      broken: [{ command: nodeEval('process.exit(3)') }],
      after: [touch('after')],
    });
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await runTasks(dir, [])).toBe('failure');
    expect(existsSync(path.join(dir, 'after'))).toBe(false);
    expect(err).toHaveBeenCalledWith(
      'devrelay: [broken] warning: task failed; later tasks were not run',
    );
    err.mockRestore();
  });

  it('leaves no SIGINT listener behind', async () => {
    await writeConfig({});
    const before = process.listenerCount('SIGINT');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    await runTasks(dir, []);
    expect(process.listenerCount('SIGINT')).toBe(before);
    vi.restoreAllMocks();
  });
});
