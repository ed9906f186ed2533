/**
 * Tests for the PipelineRun state machine.
 */

import { CompileError } from "../shared/errors.js";
import { IllegalTransitionError, PipelineRun, type RunTransition } from "./pipelineRun.js";

describe("PipelineRun", () => {
  it("walks the happy path with compilation", () => {
    const run = new PipelineRun("adminportal", "production");
    run.advance("staged");
    run.advance("dependencies_resolved");
    run.advance("compiled");
    run.advance("assembled");
    run.advance("tagged", "adminportal:production-abc");

    expect(run.state).toBe("tagged");
    expect(run.isTerminal()).toBe(true);
    expect(run.history.map((t) => `${t.from}->${t.to}`)).toEqual([
      "pending->staged",
      "staged->dependencies_resolved",
      "dependencies_resolved->compiled",
      "compiled->assembled",
      "assembled->tagged",
    ]);
    expect(run.history[4]?.detail).toBe("adminportal:production-abc");
  });

  it("records a skipped compile as its own state", () => {
    const run = new PipelineRun("worker", "production");
    run.advance("staged");
    run.advance("dependencies_resolved");
    run.advance("compile_skipped", "no build step");
    run.advance("assembled");
    expect(run.history.map((t) => t.to)).toContain("compile_skipped");
  });

  it("rejects skipping a stage", () => {
    const run = new PipelineRun("worker", "production");
    expect(() => run.advance("assembled")).toThrow(IllegalTransitionError);
    expect(() => run.advance("assembled")).toThrow("Illegal run transition pending -> assembled");
    expect(run.state).toBe("pending");
  });

  it("fails from any non-terminal state and stays failed", () => {
    const run = new PipelineRun("adminportal", "production");
    run.advance("staged");
    run.advance("dependencies_resolved");
    const error = new CompileError("Build command exited with code 1");
    run.fail(error);

    expect(run.state).toBe("failed");
    expect(run.error).toBe(error);
    expect(run.history.at(-1)?.detail).toBe("Build command exited with code 1");
    expect(() => run.advance("compiled")).toThrow(IllegalTransitionError);
    expect(() => run.fail(error)).toThrow(IllegalTransitionError);
  });

  it("reports every transition to the listener", () => {
    const seen: RunTransition[] = [];
    const run = new PipelineRun("worker", "dev", (_run, transition) => seen.push(transition));
    run.advance("staged");
    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ from: "pending", to: "staged" });
  });
});
