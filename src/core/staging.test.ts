import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import type { Exercise } from '../schema/index.js';
import { createStagingArea, packageManifest, stage, StagingError } from './staging.js';

describe('stage', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'noirlings-stage-'));
    await mkdir(path.join(root, 'exercises'));
    await writeFile(path.join(root, 'exercises', 'ex1.nr'), 'fn main() {}\n');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const exercise: Exercise = {
    name: 'ex1',
    path: 'exercises/ex1.nr',
    mode: { kind: 'build' },
    hint: '',
  };

  it('lays out the area under its root', () => {
    const area = createStagingArea('/work/runner_crate');
    expect(area).toEqual({
      root: '/work/runner_crate',
      packageName: 'runner_crate',
      manifestFile: '/work/runner_crate/Nargo.toml',
      sourceFile: '/work/runner_crate/src/main.nr',
      inputName: 'Prover',
      inputFile: '/work/runner_crate/Prover.toml',
      targetDir: '/work/runner_crate/target',
    });
  });

  it('copies the source, creating the area and overwriting old contents', async () => {
    const area = createStagingArea(path.join(root, 'runner_crate'));
    await mkdir(path.dirname(area.sourceFile), { recursive: true });
    await writeFile(area.sourceFile, 'stale');

    const unit = await stage(area, exercise, undefined, root);

    expect(unit).toEqual({ area, exercise: 'ex1', packageName: 'runner_crate' });
    expect(await readFile(area.sourceFile, 'utf-8')).toBe('fn main() {}\n');
  });

  it('creates a package manifest in a fresh custom area', async () => {
    const area = createStagingArea(path.join(root, 'area-2'));

    const unit = await stage(area, exercise, undefined, root);

    expect(unit.packageName).toBe('area_2');
    expect((await readdir(area.root)).sort()).toEqual(['Nargo.toml', 'src']);
    expect(await readFile(area.manifestFile, 'utf-8')).toBe(
      '[package]\nname = "area_2"\ntype = "bin"\nauthors = [""]\n\n[dependencies]\n',
    );
  });

  it('takes the package name from an existing manifest', async () => {
    const area = createStagingArea(path.join(root, 'scratch'));
    await mkdir(area.root);
    await writeFile(area.manifestFile, packageManifest('runner_crate'));

    const unit = await stage(area, exercise, undefined, root);

    expect(unit.packageName).toBe('runner_crate');
    expect(await readFile(area.manifestFile, 'utf-8')).toBe(packageManifest('runner_crate'));
  });

  it('fails with StagingError when the manifest names no package', async () => {
    const area = createStagingArea(path.join(root, 'broken'));
    await mkdir(area.root);
    await writeFile(area.manifestFile, '[dependencies]\n');

    await expect(stage(area, exercise, undefined, root)).rejects.toThrow(
      /declares no package name$/,
    );
  });

  it('writes inlined inputs', async () => {
    const area = createStagingArea(path.join(root, 'runner_crate'));
    await stage(area, exercise, { kind: 'inlined', text: 'x = "1"' }, root);

    expect(await readFile(area.inputFile, 'utf-8')).toBe('x = "1"');
  });

  it('copies referenced inputs', async () => {
    await writeFile(path.join(root, 'inputs.toml'), 'y = "2"\n');
    const area = createStagingArea(path.join(root, 'runner_crate'));
    await stage(area, exercise, { kind: 'path', path: 'inputs.toml' }, root);

    expect(await readFile(area.inputFile, 'utf-8')).toBe('y = "2"\n');
  });

  it('fails with StagingError when the source is missing', async () => {
    const area = createStagingArea(path.join(root, 'runner_crate'));
    const missing: Exercise = { ...exercise, path: 'exercises/missing.nr' };

    await expect(stage(area, missing, undefined, root)).rejects.toBeInstanceOf(
      StagingError,
    );
  });

  it('fails with StagingError when the area cannot be created', async () => {
    await writeFile(path.join(root, 'blocked'), 'a file, not a directory');
    const area = createStagingArea(path.join(root, 'blocked'));

    await expect(stage(area, exercise, undefined, root)).rejects.toThrow(
      /^Unable to create the working area/,
    );
  });
});
