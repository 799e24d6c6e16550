import { copyFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ConfigPayload, Exercise } from '../schema/index.js';
import { STAGING } from '../config/defaults.js';

// ── Error ─────────────────────────────────────────────────────

/** The working unit could not be prepared. Fatal to the exercise. */
export class StagingError extends Error {
  constructor(message: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${message}: ${reason}`, { cause });
    this.name = 'StagingError';
  }
}

// ── Public types ─────────────────────────────────────────────

/**
 * A working package the toolkit compiles. One exercise at a time:
 * concurrent runs must each use their own area.
 */
export interface StagingArea {
  readonly root: string;
  /** Package name written into a fresh Nargo.toml. */
  readonly packageName: string;
  readonly manifestFile: string;
  readonly sourceFile: string;
  readonly inputName: string;
  readonly inputFile: string;
  readonly targetDir: string;
}

/** Handle to a freshly staged exercise, passed to the toolkit. */
export interface WorkingUnit {
  readonly area: StagingArea;
  readonly exercise: string;
  /** Package name nargo builds under, as declared in Nargo.toml. */
  readonly packageName: string;
}

export function createStagingArea(
  root: string = path.resolve(STAGING.DIR_NAME),
): StagingArea {
  return {
    root,
    packageName: toPackageName(path.basename(root)),
    manifestFile: path.join(root, STAGING.MANIFEST_FILE),
    sourceFile: path.join(root, STAGING.SOURCE_FILE),
    inputName: STAGING.INPUT_NAME,
    inputFile: path.join(root, `${STAGING.INPUT_NAME}.toml`),
    targetDir: path.join(root, STAGING.TARGET_DIR),
  };
}

// Nargo package names are identifiers.
function toPackageName(dirName: string): string {
  const name = dirName.replace(/[^A-Za-z0-9_]/g, '_');
  return /^[A-Za-z_]/.test(name) ? name : `_${name}`;
}

// ── Staging ──────────────────────────────────────────────────

/**
 * Copy the exercise source into the area, replacing the previous one,
 * and write its inputs when a payload is given. Payload paths and the
 * exercise path are relative to `rootDir`.
 *
 * A missing Nargo.toml is created for `area.packageName`; an existing one
 * decides the package name the toolkit builds under.
 */
export async function stage(
  area: StagingArea,
  exercise: Exercise,
  payload?: ConfigPayload,
  rootDir: string = process.cwd(),
): Promise<WorkingUnit> {
  const source = path.resolve(rootDir, exercise.path);

  try {
    await mkdir(path.dirname(area.sourceFile), { recursive: true });
  } catch (err) {
    throw new StagingError(`Unable to create the working area ${area.root}`, err);
  }

  const packageName = await ensurePackageManifest(area);

  try {
    await copyFile(source, area.sourceFile);
  } catch (err) {
    throw new StagingError(
      `Unable to stage ${exercise.path} into ${area.sourceFile}`,
      err,
    );
  }

  if (payload !== undefined) {
    await stageInputs(area, payload, rootDir);
  }

  return { area, exercise: exercise.name, packageName };
}

const PACKAGE_NAME_PATTERN = /^\s*name\s*=\s*"([^"]+)"/m;

async function ensurePackageManifest(area: StagingArea): Promise<string> {
  let manifest: string | undefined;
  try {
    manifest = await readFile(area.manifestFile, 'utf-8');
  } catch (err) {
    if (!isNotFound(err)) {
      throw new StagingError(`Unable to read ${area.manifestFile}`, err);
    }
  }

  if (manifest !== undefined) {
    const name = PACKAGE_NAME_PATTERN.exec(manifest)?.[1];
    if (name === undefined) {
      throw new StagingError(
        `Unable to stage into ${area.root}`,
        `${area.manifestFile} declares no package name`,
      );
    }
    return name;
  }

  try {
    await writeFile(area.manifestFile, packageManifest(area.packageName), 'utf-8');
  } catch (err) {
    throw new StagingError(`Unable to write ${area.manifestFile}`, err);
  }
  return area.packageName;
}

export function packageManifest(packageName: string): string {
  return [
    '[package]',
    `name = "${packageName}"`,
    'type = "bin"',
    'authors = [""]',
    '',
    '[dependencies]',
    '',
  ].join('\n');
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function stageInputs(
  area: StagingArea,
  payload: ConfigPayload,
  rootDir: string,
): Promise<void> {
  try {
    if (payload.kind === 'inlined') {
      await writeFile(area.inputFile, payload.text, 'utf-8');
    } else {
      await copyFile(path.resolve(rootDir, payload.path), area.inputFile);
    }
  } catch (err) {
    throw new StagingError(`Unable to write inputs to ${area.inputFile}`, err);
  }
}
