import { nanoid } from "nanoid";
import {
  InvalidTransitionError,
  MissionAlreadyExistsError,
  MissionNotFoundError,
  StepResultRejectedError,
} from "./errors";
import type { MissionJournal } from "./mission-journal";
import { canTransition, isTerminal } from "./mission-transitions";
import {
  type AssignmentVerdict,
  type EmployeeId,
  type FailureReason,
  type Mission,
  type MissionId,
  type MissionMode,
  type ProjectId,
  type Protocol,
  type StepResult,
  type TraceId,
  asMissionId,
  asTraceId,
} from "./types";

export interface CreateMissionInput {
  employeeId: EmployeeId;
  projectId: ProjectId;
  missionId?: MissionId;
  traceId?: TraceId;
}

export type StepResultInput = Omit<StepResult, "at"> & { at?: string };

/**
 * Single writer for mission state. Every mutation runs against a draft
 * copy and is committed with one map assignment, so readers only ever see
 * whole snapshots. Mutations are synchronous, which serializes writes for
 * a mission without any locking.
 */
export class MissionStateTracker {
  private readonly missions = new Map<MissionId, Mission>();

  constructor(
    private readonly journal?: MissionJournal,
    private readonly clock: () => string = () => new Date().toISOString(),
  ) {}

  create(input: CreateMissionInput): MissionId {
    const missionId = input.missionId ?? asMissionId(`mission-${nanoid(8)}`);
    if (this.missions.has(missionId)) {
      throw new MissionAlreadyExistsError(missionId);
    }

    const now = this.clock();
    const mission: Mission = {
      missionId,
      traceId: input.traceId ?? asTraceId(nanoid()),
      employeeId: input.employeeId,
      projectId: input.projectId,
      mode: "PENDING",
      protocolVersion: null,
      stepCount: 0,
      assignmentVerdict: null,
      stepResults: [],
      failureReason: null,
      history: [{ mode: "PENDING", enteredAt: now }],
      createdAt: now,
      updatedAt: now,
      completedAt: null,
    };

    this.commit(mission);
    return missionId;
  }

  get(missionId: MissionId): Mission {
    return structuredClone(this.require(missionId));
  }

  has(missionId: MissionId): boolean {
    return this.missions.has(missionId);
  }

  list(): Mission[] {
    return [...this.missions.values()]
      .map((mission) => structuredClone(mission))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  setMode(
    missionId: MissionId,
    mode: MissionMode,
    reason?: FailureReason,
  ): Mission {
    return this.update(missionId, (draft, now) => {
      if (isTerminal(draft.mode) || !canTransition(draft.mode, mode)) {
        throw new InvalidTransitionError(draft.mode, mode);
      }

      const current = draft.history.at(-1);
      if (current) {
        current.exitedAt = now;
      }
      draft.history.push({ mode, enteredAt: now });
      draft.mode = mode;

      if (mode === "FAILED") {
        draft.failureReason = reason ?? draft.failureReason;
      }
      if (isTerminal(mode)) {
        draft.completedAt = now;
      }
    });
  }

  bindProtocol(missionId: MissionId, protocol: Protocol): Mission {
    return this.update(missionId, (draft) => {
      if (draft.stepResults.length > 0) {
        throw new StepResultRejectedError(
          missionId,
          `cannot rebind protocol after ${draft.stepResults.length} step results`,
        );
      }
      draft.protocolVersion = protocol.version;
      draft.stepCount = protocol.steps.length;
    });
  }

  recordAssignment(missionId: MissionId, verdict: AssignmentVerdict): Mission {
    return this.update(missionId, (draft) => {
      draft.assignmentVerdict = { ...verdict };
    });
  }

  appendStepResult(missionId: MissionId, result: StepResultInput): Mission {
    return this.update(missionId, (draft, now) => {
      if (draft.mode !== "EXECUTION") {
        throw new StepResultRejectedError(
          missionId,
          `mission is ${draft.mode}, not EXECUTION`,
        );
      }
      if (result.stepIndex >= draft.stepCount) {
        throw new StepResultRejectedError(
          missionId,
          `step ${result.stepIndex} is outside a ${draft.stepCount}-step protocol`,
        );
      }
      if (result.stepIndex !== draft.stepResults.length) {
        throw new StepResultRejectedError(
          missionId,
          `expected step ${draft.stepResults.length}, got ${result.stepIndex}`,
        );
      }

      draft.stepResults.push({
        stepIndex: result.stepIndex,
        kind: result.kind,
        status: result.status,
        detail: result.detail,
        ...(result.attempts !== undefined ? { attempts: result.attempts } : {}),
        at: result.at ?? now,
      });
    });
  }

  private update(
    missionId: MissionId,
    mutate: (draft: Mission, now: string) => void,
  ): Mission {
    const draft = structuredClone(this.require(missionId));
    const now = this.clock();
    mutate(draft, now);
    draft.updatedAt = now;
    this.commit(draft);
    return structuredClone(draft);
  }

  // Journal first: a failed save leaves the previous snapshot in place.
  private commit(mission: Mission): void {
    this.journal?.save(mission);
    this.missions.set(mission.missionId, mission);
  }

  private require(missionId: MissionId): Mission {
    const mission = this.missions.get(missionId);
    if (!mission) {
      throw new MissionNotFoundError(missionId);
    }
    return mission;
  }
}
