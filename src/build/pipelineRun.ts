/**
 * One pipeline run's state machine.
 *
 *   pending → staged → dependencies_resolved → compiled ────────┐
 *                                            → compile_skipped ─┴→ assembled → tagged
 *
 * Any non-terminal state may move to failed. Skipping compilation is a state
 * of its own so a run's history shows why no artifact was built.
 */

import * as crypto from "crypto";
import type { BuildError } from "../shared/errors.js";

export type RunState =
  | "pending"
  | "staged"
  | "dependencies_resolved"
  | "compiled"
  | "compile_skipped"
  | "assembled"
  | "tagged"
  | "failed";

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  pending: ["staged", "failed"],
  staged: ["dependencies_resolved", "failed"],
  dependencies_resolved: ["compiled", "compile_skipped", "failed"],
  compiled: ["assembled", "failed"],
  compile_skipped: ["assembled", "failed"],
  assembled: ["tagged", "failed"],
  tagged: [],
  failed: [],
};

export interface RunTransition {
  from: RunState;
  to: RunState;
  at: string;
  detail?: string;
}

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: RunState,
    public readonly to: RunState,
  ) {
    super(`Illegal run transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export class PipelineRun {
  readonly id = crypto.randomUUID();
  readonly history: RunTransition[] = [];
  private current: RunState = "pending";
  private failure: BuildError | null = null;

  constructor(
    readonly service: string,
    readonly environment: string,
    private readonly onTransition?: (run: PipelineRun, transition: RunTransition) => void,
  ) {}

  get state(): RunState {
    return this.current;
  }

  get error(): BuildError | null {
    return this.failure;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canAdvance(to: RunState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  advance(to: Exclude<RunState, "failed">, detail?: string): void {
    this.transition(to, detail);
  }

  fail(error: BuildError): void {
    this.failure = error;
    this.transition("failed", error.message);
  }

  private transition(to: RunState, detail?: string): void {
    if (!this.canAdvance(to)) throw new IllegalTransitionError(this.current, to);
    const transition: RunTransition = { from: this.current, to, at: new Date().toISOString() };
    if (detail !== undefined) transition.detail = detail;
    this.current = to;
    this.history.push(transition);
    this.onTransition?.(this, transition);
  }
}
