// ── Pipeline stages ───────────────────────────────────────────
// Staging runs before every pipeline and is not a stage: its failures
// abort the exercise instead of producing an outcome.

export type PipelineStage = 'compile' | 'execute' | 'prove' | 'verify' | 'test';

// ── Outcome ───────────────────────────────────────────────────

export interface PipelineSuccess {
  readonly ok: true;
  readonly output: string;
}

export interface PipelineFailure {
  readonly ok: false;
  /** The step that ran and failed. */
  readonly stage: PipelineStage;
  readonly cause: string;
  /** Downstream steps never reached because of this failure, in order. */
  readonly skipped: readonly PipelineStage[];
  /**
   * True when the failing step was not the mode's last one, so later
   * steps were skipped; false when the last step itself failed.
   */
  readonly downstreamSkipped: boolean;
}

export type PipelineOutcome = PipelineSuccess | PipelineFailure;
