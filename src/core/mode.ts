import type { ConfigPayload, Mode } from '../schema/index.js';

// ── Error ─────────────────────────────────────────────────────

export type ModeDecodeErrorCode =
  | 'UnknownModeTag'
  | 'UnknownModeField'
  | 'InvalidModeShape';

export class ModeDecodeError extends Error {
  readonly code: ModeDecodeErrorCode;

  constructor(code: ModeDecodeErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = 'ModeDecodeError';
    this.code = code;
  }
}

// ── Recognized tags ───────────────────────────────────────────

const STRING_TAGS = ['build', 'test'] as const;
const MAP_FIELDS = ['execute', 'proveOnly', 'proveAndVerify'] as const;
const PAYLOAD_FIELDS = ['inlined', 'path'] as const;

type MapField = (typeof MAP_FIELDS)[number];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMapField(key: string): key is MapField {
  return (MAP_FIELDS as readonly string[]).includes(key);
}

// ── Decoder ───────────────────────────────────────────────────

/**
 * Decode the `mode` value of a manifest entry.
 *
 * Accepts either a bare tag (`"build"`, `"test"`) or a map with a single
 * key naming the variant:
 *
 *   { execute: { inlined: "x = '1'" } }
 *   { proveOnly: { path: "inputs/p1.toml" } }
 *   { proveAndVerify: { tomlFile: { path: "..." }, saveFiles: true } }
 *
 * Pure: payload paths are stored, never read.
 */
export function decodeMode(value: unknown): Mode {
  if (typeof value === 'string') {
    return decodeTag(value);
  }
  if (isRecord(value)) {
    return decodeMap(value);
  }
  throw new ModeDecodeError(
    'InvalidModeShape',
    `expected a string or a map, got ${describe(value)}`,
  );
}

function decodeTag(tag: string): Mode {
  switch (tag) {
    case 'build':
      return { kind: 'build' };
    case 'test':
      return { kind: 'test' };
    default:
      throw new ModeDecodeError(
        'UnknownModeTag',
        `unknown mode "${tag}", expected one of ${STRING_TAGS.join(', ')}`,
      );
  }
}

function decodeMap(map: Record<string, unknown>): Mode {
  const entries = Object.entries(map);
  const first = entries[0];
  if (first === undefined || entries.length > 1) {
    throw new ModeDecodeError(
      'InvalidModeShape',
      `a mode map must have exactly one key, got ${String(entries.length)}`,
    );
  }

  const [key, body] = first;
  if (!isMapField(key)) {
    throw new ModeDecodeError(
      'UnknownModeField',
      `unknown mode "${key}", expected one of ${MAP_FIELDS.join(', ')}`,
    );
  }

  switch (key) {
    case 'execute':
      return { kind: 'execute', payload: decodePayload(body, key) };
    case 'proveOnly':
      return { kind: 'proveOnly', payload: decodePayload(body, key) };
    case 'proveAndVerify':
      return decodeProveAndVerify(body);
  }
}

function decodeProveAndVerify(body: unknown): Mode {
  if (!isRecord(body)) {
    throw new ModeDecodeError(
      'InvalidModeShape',
      `proveAndVerify expects a map, got ${describe(body)}`,
    );
  }

  for (const key of Object.keys(body)) {
    if (key !== 'tomlFile' && key !== 'saveFiles') {
      throw new ModeDecodeError(
        'UnknownModeField',
        `unknown proveAndVerify field "${key}", expected tomlFile, saveFiles`,
      );
    }
  }

  const saveFiles = body['saveFiles'];
  if (typeof saveFiles !== 'boolean') {
    throw new ModeDecodeError(
      'InvalidModeShape',
      `proveAndVerify.saveFiles must be a boolean, got ${describe(saveFiles)}`,
    );
  }

  return {
    kind: 'proveAndVerify',
    payload: decodePayload(body['tomlFile'], 'proveAndVerify.tomlFile'),
    retainIntermediateFiles: saveFiles,
  };
}

function decodePayload(value: unknown, where: string): ConfigPayload {
  if (!isRecord(value)) {
    throw new ModeDecodeError(
      'InvalidModeShape',
      `${where} expects a map with "inlined" or "path", got ${describe(value)}`,
    );
  }

  const entries = Object.entries(value);
  const first = entries[0];
  if (first === undefined || entries.length > 1) {
    throw new ModeDecodeError(
      'InvalidModeShape',
      `${where} must have exactly one of ${PAYLOAD_FIELDS.join(', ')}`,
    );
  }

  const [key, text] = first;
  if (key !== 'inlined' && key !== 'path') {
    throw new ModeDecodeError(
      'UnknownModeField',
      `unknown ${where} field "${key}", expected one of ${PAYLOAD_FIELDS.join(', ')}`,
    );
  }
  if (typeof text !== 'string') {
    throw new ModeDecodeError(
      'InvalidModeShape',
      `${where}.${key} must be a string, got ${describe(text)}`,
    );
  }

  return key === 'inlined'
    ? { kind: 'inlined', text }
    : { kind: 'path', path: text };
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value;
}

// ── Encoder ───────────────────────────────────────────────────

/** Manifest representation of a mode; inverse of `decodeMode`. */
export function encodeMode(mode: Mode): unknown {
  switch (mode.kind) {
    case 'build':
    case 'test':
      return mode.kind;
    case 'execute':
      return { execute: encodePayload(mode.payload) };
    case 'proveOnly':
      return { proveOnly: encodePayload(mode.payload) };
    case 'proveAndVerify':
      return {
        proveAndVerify: {
          tomlFile: encodePayload(mode.payload),
          saveFiles: mode.retainIntermediateFiles,
        },
      };
  }
}

function encodePayload(payload: ConfigPayload): Record<string, string> {
  return payload.kind === 'inlined'
    ? { inlined: payload.text }
    : { path: payload.path };
}
