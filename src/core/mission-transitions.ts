import { InvalidTransitionError } from "./errors";
import { type MissionMode, TERMINAL_MODES } from "./types";

export type MissionEvent =
  | "protocol-missing"
  | "protocol-found"
  | "protocol-created"
  | "lookup-failed"
  | "assignment-denied"
  | "assignment-unreachable"
  | "fatal-step-failed"
  | "steps-exhausted"
  | "blocked-finalized";

const TRANSITIONS: Record<
  MissionMode,
  Partial<Record<MissionEvent, MissionMode>>
> = {
  PENDING: {
    "protocol-missing": "PROTOCOL_CREATION",
    "protocol-found": "EXECUTION",
    "lookup-failed": "FAILED",
  },
  PROTOCOL_CREATION: {
    "protocol-created": "EXECUTION",
    "lookup-failed": "FAILED",
  },
  EXECUTION: {
    "assignment-denied": "BLOCKED",
    "assignment-unreachable": "FAILED",
    "fatal-step-failed": "FAILED",
    "steps-exhausted": "COMPLETED",
  },
  BLOCKED: {
    "blocked-finalized": "FAILED",
  },
  COMPLETED: {},
  FAILED: {},
};

export const isTerminal = (mode: MissionMode): boolean =>
  TERMINAL_MODES.has(mode);

export const transition = (
  mode: MissionMode,
  event: MissionEvent,
): MissionMode => {
  const next = TRANSITIONS[mode][event];
  if (!next) {
    throw new InvalidTransitionError(mode, event);
  }
  return next;
};

/** True when some event moves `from` to `to`. */
export const canTransition = (from: MissionMode, to: MissionMode): boolean =>
  Object.values(TRANSITIONS[from]).includes(to);
