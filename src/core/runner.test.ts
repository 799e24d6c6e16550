import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import type { Exercise } from '../schema/index.js';
import { ConfigReadError } from '../config/payload.js';
import { createMockToolkit } from '../toolkit/index.js';
import { createMockProver } from '../prover/index.js';
import type { CommandRunner } from '../utils/command.js';
import { createStagingArea } from './staging.js';
import type { StagingArea } from './staging.js';
import { resetExercise, runExercise } from './runner.js';

describe('runExercise', () => {
  let root: string;
  let area: StagingArea;

  function written(): string[] {
    return vi.mocked(process.stderr.write).mock.calls.map((call) => String(call[0]));
  }

  beforeEach(async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    root = await mkdtemp(path.join(os.tmpdir(), 'noirlings-runner-'));
    await writeFile(path.join(root, 'ex1.nr'), 'fn main() {}\n');
    area = createStagingArea(path.join(root, 'runner_crate'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('echoes the resolved inputs on success', async () => {
    await writeFile(path.join(root, 'inputs.toml'), 'x = "7"');
    const exercise: Exercise = {
      name: 'ex1',
      path: 'ex1.nr',
      mode: { kind: 'proveOnly', payload: { kind: 'path', path: 'inputs.toml' } },
      hint: '',
    };

    const outcome = await runExercise(exercise, {
      area,
      toolkit: createMockToolkit(),
      prover: createMockProver(),
      rootDir: root,
    });

    expect(outcome.ok).toBe(true);
    expect(written()).toContain('⏳ Running ex1.nr exercise...\n');
    expect(written()).toContain(
      '✅ Successfully ran ex1.nr and created proof!\n With inputs: x = "7"\n',
    );
  });

  it('prints the diagnostic then a prover installation hint', async () => {
    const exercise: Exercise = {
      name: 'ex1',
      path: 'ex1.nr',
      mode: { kind: 'proveOnly', payload: { kind: 'inlined', text: 'x = 1' } },
      hint: '',
    };

    const outcome = await runExercise(exercise, {
      area,
      toolkit: createMockToolkit(),
      prover: createMockProver({ failures: { prove: 'boom' } }),
      rootDir: root,
    });

    expect(outcome.ok).toBe(false);
    const lines = written();
    const diagnostic = lines.indexOf('Mock prove failed: boom\n');
    expect(diagnostic).toBeGreaterThan(-1);
    expect(lines.slice(diagnostic + 1, diagnostic + 3)).toEqual([
      '⚠️  Execution worked but failed to create proof with barretenberg for ex1.nr! Please try again.\n',
      'Are you sure you installed barretenberg (bb) properly?\n',
    ]);
  });

  it('aborts with ConfigReadError before staging when inputs are unreadable', async () => {
    const toolkit = createMockToolkit();
    const exercise: Exercise = {
      name: 'ex1',
      path: 'ex1.nr',
      mode: { kind: 'execute', payload: { kind: 'path', path: 'missing.toml' } },
      hint: '',
    };

    await expect(
      runExercise(exercise, { area, toolkit, prover: createMockProver(), rootDir: root }),
    ).rejects.toBeInstanceOf(ConfigReadError);
    expect(toolkit.calls).toEqual([]);
  });
});

describe('resetExercise', () => {
  const exercise: Exercise = {
    name: 'ex1',
    path: 'exercises/ex1.nr',
    mode: { kind: 'build' },
    hint: '',
  };

  it('stashes the exercise file with git', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({
      ok: true,
      stdout: '',
      stderr: '',
      reason: '',
    });

    const result = await resetExercise(exercise, '/course', run);

    expect(run).toHaveBeenCalledWith('git', ['stash', '--', 'exercises/ex1.nr'], '/course');
    expect(result).toEqual({
      ok: true,
      message: 'The file exercises/ex1.nr has been reset!',
    });
  });

  it('reports a git failure without retrying', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({
      ok: false,
      stdout: '',
      stderr: 'fatal: not a git repository\n',
      reason: 'Command failed with exit code 128',
    });

    const result = await resetExercise(exercise, '/course', run);

    expect(run).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      ok: false,
      message: 'Failed to reset exercises/ex1.nr: fatal: not a git repository',
    });
  });
});
