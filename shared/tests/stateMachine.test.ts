import { describe, expect, it } from "vitest";
import { InvalidTaskTransition } from "../src/errors.js";
import {
  assertRunTransition,
  assertTaskTransition,
  canTransitionRun,
  canTransitionTask,
  isTerminalTaskStatus
} from "../src/stateMachine.js";

describe("run state machine", () => {
  it("allows running -> completed", () => {
    expect(canTransitionRun("running", "completed")).toBe(true);
  });

  it("blocks terminal transitions", () => {
    expect(canTransitionRun("completed", "running")).toBe(false);
    expect(() => assertRunTransition("cancelled", "failed")).toThrow("Invalid run transition: cancelled -> failed");
  });
});

describe("task state machine", () => {
  it("follows pending -> queued -> running -> completed", () => {
    expect(canTransitionTask("pending", "queued")).toBe(true);
    expect(canTransitionTask("queued", "running")).toBe(true);
    expect(canTransitionTask("running", "completed")).toBe(true);
  });

  it("allows running -> queued for retries and lease recovery", () => {
    expect(canTransitionTask("running", "queued")).toBe(true);
  });

  it("only cancels pending or queued tasks", () => {
    expect(canTransitionTask("pending", "cancelled")).toBe(true);
    expect(canTransitionTask("queued", "cancelled")).toBe(true);
    expect(canTransitionTask("running", "cancelled")).toBe(false);
  });

  it("never moves backward to pending", () => {
    expect(canTransitionTask("queued", "pending")).toBe(false);
    expect(canTransitionTask("running", "pending")).toBe(false);
  });

  it("keeps terminal states final", () => {
    expect(isTerminalTaskStatus("failed")).toBe(true);
    expect(() => assertTaskTransition("t-1", "completed", "queued")).toThrow(InvalidTaskTransition);
  });
});
