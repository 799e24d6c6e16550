// Plain shapes; manifest values are checked against them by hand in core/mode.ts.

// ── ConfigPayload ─────────────────────────────────────────────

/** Circuit inputs, either written inline in the manifest or kept in a file. */
export type ConfigPayload =
  | { readonly kind: 'inlined'; readonly text: string }
  | { readonly kind: 'path'; readonly path: string };

// ── Mode ──────────────────────────────────────────────────────

export type BuildMode = { readonly kind: 'build' };

export type ExecuteMode = {
  readonly kind: 'execute';
  readonly payload: ConfigPayload;
};

export type ProveOnlyMode = {
  readonly kind: 'proveOnly';
  readonly payload: ConfigPayload;
};

export type ProveAndVerifyMode = {
  readonly kind: 'proveAndVerify';
  readonly payload: ConfigPayload;
  readonly retainIntermediateFiles: boolean;
};

export type TestMode = { readonly kind: 'test' };

export type Mode =
  | BuildMode
  | ExecuteMode
  | ProveOnlyMode
  | ProveAndVerifyMode
  | TestMode;

export type ModeKind = Mode['kind'];

/** Modes that stage an input file before running. */
export type PayloadMode = ExecuteMode | ProveOnlyMode | ProveAndVerifyMode;

export function hasPayload(mode: Mode): mode is PayloadMode {
  return (
    mode.kind === 'execute' ||
    mode.kind === 'proveOnly' ||
    mode.kind === 'proveAndVerify'
  );
}
