import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { Context } from '@/runner/task/context';
import { makeTempDir, rmDirWithRetries } from '@/test';

import { startSetWorkdir, validateSetWorkdir } from './workdir';

describe('set-workdir operation', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('workdir');
    await mkdir(path.join(dir, 'frontend', 'src'), { recursive: true });
    await writeFile(path.join(dir, 'file.txt'), 'x');
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('changes the working directory of the current frame only', async () => {
    const ctx = new Context(dir);
    ctx.push('outer');
    ctx.push('inner');
    const handle = await startSetWorkdir(
      { kind: 'set-workdir', path: 'frontend' },
      ctx,
    );
    expect(await handle.finish()).toBe('success');
    expect(handle.tryFinish()).toBe('success');
    expect(ctx.workdir()).toBe(path.join(dir, 'frontend'));

    // relative to the new directory
    await startSetWorkdir({ kind: 'set-workdir', path: 'src' }, ctx);
    expect(ctx.workdir()).toBe(path.join(dir, 'frontend', 'src'));

    ctx.pop();
    expect(ctx.workdir()).toBe(dir);
  });

  it('fails for a missing path or a file', async () => {
    const ctx = new Context(dir);
    ctx.push('t');
    await expect(
      startSetWorkdir({ kind: 'set-workdir', path: 'missing' }, ctx),
    ).rejects.toThrow(
      `'${path.join(dir, 'missing')}' is not a valid path to a directory (or it is inaccessible)`,
    );
    await expect(
      startSetWorkdir({ kind: 'set-workdir', path: 'file.txt' }, ctx),
    ).rejects.toThrow('is not a valid path to a directory');
    expect(ctx.workdir()).toBe(dir);
  });

  it('rejects a blank path at validation time', () => {
    expect(() => validateSetWorkdir({ kind: 'set-workdir', path: '  ' })).toThrow(
      'path must be non-empty',
    );
  });
});
