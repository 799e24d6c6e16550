import { access, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import type { Exercise, Mode } from '../schema/index.js';
import { createMockToolkit } from '../toolkit/index.js';
import { createMockProver } from '../prover/index.js';
import type { MockProver } from '../prover/index.js';
import { scratchFileName } from '../utils/scratch.js';
import { createStagingArea, StagingError } from './staging.js';
import type { StagingArea } from './staging.js';
import { runPipeline } from './pipeline.js';

const INPUTS = { kind: 'inlined', text: "a = '1'" } as const;

function exerciseWith(mode: Mode): Exercise {
  return { name: 'ex1', path: 'ex1.nr', mode, hint: '' };
}

async function exists(file: string): Promise<boolean> {
  return access(file).then(
    () => true,
    () => false,
  );
}

/** Prover that writes the verification key where it is told to. */
function keyWritingProver(): MockProver {
  const inner = createMockProver();
  return {
    ...inner,
    async writeVerificationKey(artifactPath: string, vkPath: string): Promise<string> {
      await inner.writeVerificationKey(artifactPath, vkPath);
      await mkdir(path.dirname(vkPath), { recursive: true });
      await writeFile(vkPath, 'vk');
      return '';
    },
  };
}

describe('runPipeline', () => {
  let root: string;
  let area: StagingArea;

  beforeEach(async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    root = await mkdtemp(path.join(os.tmpdir(), 'noirlings-pipeline-'));
    await writeFile(path.join(root, 'ex1.nr'), 'fn main() {}\n');
    area = createStagingArea(path.join(root, 'runner_crate'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('builds an exercise with empty captured output', async () => {
    const toolkit = createMockToolkit();
    const prover = createMockProver();

    const outcome = await runPipeline(exerciseWith({ kind: 'build' }), {
      area,
      toolkit,
      prover,
      rootDir: root,
    });

    expect(outcome).toEqual({ ok: true, output: '' });
    expect(toolkit.calls).toEqual(['compile']);
    expect(prover.calls).toEqual([]);
  });

  it('reports a compile failure', async () => {
    const toolkit = createMockToolkit({ failures: { compile: 'error: expected ;' } });

    const outcome = await runPipeline(exerciseWith({ kind: 'build' }), {
      area,
      toolkit,
      prover: createMockProver(),
      rootDir: root,
    });

    expect(outcome).toEqual({
      ok: false,
      stage: 'compile',
      cause: 'Mock compile failed: error: expected ;',
      skipped: [],
      downstreamSkipped: false,
    });
  });

  it('executes and saves the witness under the exercise name', async () => {
    const toolkit = createMockToolkit({ returnValue: '0x01' });

    const outcome = await runPipeline(
      exerciseWith({ kind: 'execute', payload: INPUTS }),
      { area, toolkit, prover: createMockProver(), rootDir: root },
    );

    expect(outcome).toEqual({ ok: true, output: '' });
    expect(toolkit.calls).toEqual(['execute', 'saveWitness']);
  });

  it('stops a proveOnly run at a failing prove and surfaces stderr', async () => {
    const toolkit = createMockToolkit();
    const prover = createMockProver({ failures: { prove: 'bb: invalid witness' } });

    const outcome = await runPipeline(
      exerciseWith({ kind: 'proveOnly', payload: INPUTS }),
      { area, toolkit, prover, rootDir: root },
    );

    expect(outcome).toEqual({
      ok: false,
      stage: 'prove',
      cause: 'Mock prove failed: bb: invalid witness',
      skipped: [],
      downstreamSkipped: false,
    });
    expect(prover.calls.map((c) => c.operation)).toEqual(['prove']);
  });

  it('never verifies after a failing prove', async () => {
    const prover = createMockProver({ failures: { prove: 'out of memory' } });

    const outcome = await runPipeline(
      exerciseWith({
        kind: 'proveAndVerify',
        payload: INPUTS,
        retainIntermediateFiles: true,
      }),
      { area, toolkit: createMockToolkit(), prover, rootDir: root },
    );

    expect(outcome).toMatchObject({
      ok: false,
      stage: 'prove',
      skipped: ['verify'],
      downstreamSkipped: true,
    });
    expect(prover.calls.map((c) => c.operation)).toEqual(['prove']);
  });

  it('skips proving and verifying after a failing execute', async () => {
    const toolkit = createMockToolkit({ failures: { execute: 'Failed constraint' } });
    const prover = createMockProver();

    const outcome = await runPipeline(
      exerciseWith({
        kind: 'proveAndVerify',
        payload: INPUTS,
        retainIntermediateFiles: false,
      }),
      { area, toolkit, prover, rootDir: root },
    );

    expect(outcome).toEqual({
      ok: false,
      stage: 'execute',
      cause: 'Mock execute failed: Failed constraint',
      skipped: ['prove', 'verify'],
      downstreamSkipped: true,
    });
    expect(toolkit.calls).toEqual(['execute']);
    expect(prover.calls).toEqual([]);
  });

  it('keeps the verification key when intermediate files are retained', async () => {
    const prover = keyWritingProver();

    const outcome = await runPipeline(
      exerciseWith({
        kind: 'proveAndVerify',
        payload: INPUTS,
        retainIntermediateFiles: true,
      }),
      { area, toolkit: createMockToolkit(), prover, rootDir: root },
    );

    const artifact = path.join(area.targetDir, 'runner_crate.json');
    const proof = path.join(area.targetDir, 'proof-ex1');
    const vk = path.join(area.targetDir, 'vk-ex1');

    expect(outcome).toEqual({ ok: true, output: '' });
    expect(prover.calls).toEqual([
      { operation: 'prove', args: [artifact, path.join(area.targetDir, 'ex1.gz'), proof] },
      { operation: 'writeVk', args: [artifact, vk] },
      { operation: 'verify', args: [vk, proof] },
    ]);
    expect(await exists(vk)).toBe(true);
  });

  it('uses a scratch verification key that is removed afterwards', async () => {
    const prover = keyWritingProver();

    const outcome = await runPipeline(
      exerciseWith({
        kind: 'proveAndVerify',
        payload: INPUTS,
        retainIntermediateFiles: false,
      }),
      { area, toolkit: createMockToolkit(), prover, rootDir: root },
    );

    const scratchVk = path.join(area.targetDir, `${scratchFileName()}.vk`);

    expect(outcome).toEqual({ ok: true, output: '' });
    expect(prover.calls.map((c) => c.operation)).toEqual(['prove', 'writeVk', 'verify']);
    expect(prover.calls[1]?.args[1]).toBe(scratchVk);
    expect(prover.calls[2]?.args[0]).toBe(scratchVk);
    expect(await exists(scratchVk)).toBe(false);
    expect(await exists(path.join(area.targetDir, 'vk-ex1'))).toBe(false);
  });

  it('aggregates failing embedded tests into one failure', async () => {
    const toolkit = createMockToolkit({
      tests: [
        { name: 'test_a', passed: true },
        { name: 'test_b', passed: false },
      ],
    });

    const outcome = await runPipeline(exerciseWith({ kind: 'test' }), {
      area,
      toolkit,
      prover: createMockProver(),
      rootDir: root,
    });

    expect(outcome).toEqual({
      ok: false,
      stage: 'test',
      cause: '1 of 2 tests failed: test_b',
      skipped: [],
      downstreamSkipped: false,
    });
  });

  it('passes when every embedded test passes', async () => {
    const toolkit = createMockToolkit({ tests: [{ name: 'test_a', passed: true }] });

    const outcome = await runPipeline(exerciseWith({ kind: 'test' }), {
      area,
      toolkit,
      prover: createMockProver(),
      rootDir: root,
    });

    expect(outcome).toEqual({ ok: true, output: '' });
    expect(toolkit.calls).toEqual(['runTests']);
  });

  it('propagates staging errors without calling the toolkit', async () => {
    const toolkit = createMockToolkit();
    const exercise: Exercise = { ...exerciseWith({ kind: 'build' }), path: 'missing.nr' };

    await expect(
      runPipeline(exercise, { area, toolkit, prover: createMockProver(), rootDir: root }),
    ).rejects.toBeInstanceOf(StagingError);
    expect(toolkit.calls).toEqual([]);
  });
});
