import { describe, expect, it } from "vitest";
import { InvalidTransitionError } from "../src/core/errors";
import {
  canTransition,
  isTerminal,
  transition,
} from "../src/core/mission-transitions";

describe("mission transitions", () => {
  it("follows the happy path through protocol creation", () => {
    let mode = transition("PENDING", "protocol-missing");
    expect(mode).toBe("PROTOCOL_CREATION");
    mode = transition(mode, "protocol-created");
    expect(mode).toBe("EXECUTION");
    expect(transition(mode, "steps-exhausted")).toBe("COMPLETED");
  });

  it("routes denied assignments through BLOCKED to FAILED", () => {
    const blocked = transition("EXECUTION", "assignment-denied");
    expect(blocked).toBe("BLOCKED");
    expect(transition(blocked, "blocked-finalized")).toBe("FAILED");
  });

  it("fails from lookup and execution errors", () => {
    expect(transition("PENDING", "lookup-failed")).toBe("FAILED");
    expect(transition("PROTOCOL_CREATION", "lookup-failed")).toBe("FAILED");
    expect(transition("EXECUTION", "fatal-step-failed")).toBe("FAILED");
    expect(transition("EXECUTION", "assignment-unreachable")).toBe("FAILED");
  });

  it("rejects events a mode does not accept", () => {
    expect(() => transition("PENDING", "steps-exhausted")).toThrow(
      InvalidTransitionError,
    );
    expect(() => transition("COMPLETED", "protocol-found")).toThrow(
      "Illegal mission transition COMPLETED -> protocol-found",
    );
  });

  it("answers reachability between modes", () => {
    expect(canTransition("PENDING", "EXECUTION")).toBe(true);
    expect(canTransition("PENDING", "COMPLETED")).toBe(false);
    expect(canTransition("BLOCKED", "COMPLETED")).toBe(false);
    expect(canTransition("FAILED", "PENDING")).toBe(false);
  });

  it("treats only COMPLETED and FAILED as terminal", () => {
    expect(isTerminal("COMPLETED")).toBe(true);
    expect(isTerminal("FAILED")).toBe(true);
    expect(isTerminal("BLOCKED")).toBe(false);
    expect(isTerminal("EXECUTION")).toBe(false);
  });
});
