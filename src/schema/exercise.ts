import { z } from 'zod';

import type { Mode } from './mode.js';

// ── Manifest entry ────────────────────────────────────────────
// `mode` stays untyped here: it is decoded by core/mode.ts.

export const exerciseEntrySchema = z
  .object({
    name: z.string().min(1),
    path: z.string().min(1),
    mode: z.unknown(),
    hint: z.string().default(''),
  })
  .strict();

export type ExerciseEntry = z.infer<typeof exerciseEntrySchema>;

export const manifestSchema = z.object({
  exercises: z.array(exerciseEntrySchema),
});

// ── Exercise ──────────────────────────────────────────────────

export interface Exercise {
  readonly name: string;
  /** Source path, relative to the manifest root. */
  readonly path: string;
  readonly mode: Mode;
  readonly hint: string;
}

// ── Completion state ──────────────────────────────────────────

export interface ContextLine {
  readonly text: string;
  /** 1-based. */
  readonly number: number;
  readonly isMarkerLine: boolean;
}

export type CompletionState =
  | { readonly status: 'done' }
  | { readonly status: 'pending'; readonly context: readonly ContextLine[] };
