import type { AssignmentChecker, WorkerOutcome } from "../collaborators/contracts";
import type { WorkerRegistry } from "../collaborators/worker-registry";
import {
  AssignmentDeniedError,
  MissionStateUnavailableError,
  ProtocolAlreadyExistsError,
  ProtocolNotFoundError,
  errorMessage,
} from "../core/errors";
import { MissionStateTracker } from "../core/mission-tracker";
import { type MissionEvent, transition } from "../core/mission-transitions";
import {
  type AssignmentVerdict,
  type CallContext,
  type EmployeeId,
  type FailureReason,
  type Mission,
  type MissionId,
  type ProjectId,
  type Protocol,
  type StepSpec,
  UNASSIGNED_ROLE,
} from "../core/types";
import { type Logger, logger, withTrace } from "../observability/logger";
import { defaultProtocolSteps } from "../protocols/protocol-definition";
import type { ProtocolStoreGateway } from "../protocols/protocol-store";

export interface CoordinatorDeps {
  protocols: ProtocolStoreGateway;
  assignments: AssignmentChecker;
  workers: WorkerRegistry;
  tracker?: MissionStateTracker;
  /** Steps written when a project has no protocol yet. */
  defaultSteps?: StepSpec[];
  logger?: Logger;
}

/**
 * Drives onboarding missions: resolves or creates the project's protocol,
 * checks the employee's assignment, then delegates each protocol step in
 * order. All mission state lives in the {@link MissionStateTracker}.
 */
export class Coordinator {
  private readonly tracker: MissionStateTracker;
  private readonly defaultSteps: StepSpec[];
  private readonly log: Logger;
  private readonly running = new Map<MissionId, Promise<Mission>>();

  constructor(private readonly deps: CoordinatorDeps) {
    this.tracker = deps.tracker ?? new MissionStateTracker();
    this.defaultSteps = deps.defaultSteps ?? defaultProtocolSteps([]);
    this.log = deps.logger ?? logger.coordinator;
  }

  /** Start a mission in the background and return its id. */
  submit(employeeId: EmployeeId, projectId: ProjectId): MissionId {
    const missionId = this.tracker.create({ employeeId, projectId });
    const run = this.drive(missionId);
    this.running.set(missionId, run);
    void run.then(
      () => this.running.delete(missionId),
      (error: unknown) => {
        this.running.delete(missionId);
        this.log.error(`mission ${missionId} left unfinished:`, errorMessage(error));
      },
    );
    return missionId;
  }

  /** Run a mission to its terminal mode. */
  async run(employeeId: EmployeeId, projectId: ProjectId): Promise<Mission> {
    return this.settled(this.submit(employeeId, projectId));
  }

  status(missionId: MissionId): Mission {
    return this.tracker.get(missionId);
  }

  async settled(missionId: MissionId): Promise<Mission> {
    const run = this.running.get(missionId);
    return run ?? this.status(missionId);
  }

  list(): Mission[] {
    return this.tracker.list();
  }

  private async drive(missionId: MissionId): Promise<Mission> {
    const mission = this.tracker.get(missionId);
    const ctx: CallContext = { traceId: mission.traceId, missionId };
    const log = withTrace(this.log, mission.traceId);
    log.info(
      `mission ${missionId} started for ${mission.employeeId} on ${mission.projectId}`,
    );

    try {
      const protocol = await this.resolveProtocol(mission, ctx, log);
      if (protocol) {
        this.tracker.bindProtocol(missionId, protocol);
        if (await this.checkAssignment(mission, ctx, log)) {
          await this.executeSteps(mission, protocol, ctx, log);
        }
      }
    } catch (error) {
      return this.abort(missionId, error, log);
    }

    const final = this.tracker.get(missionId);
    log.info(
      `mission ${missionId} ${final.mode}${final.failureReason ? ` (${final.failureReason})` : ""}`,
    );
    return final;
  }

  /** Move a mission that hit an unexpected error to FAILED. */
  private abort(missionId: MissionId, error: unknown, log: Logger): Mission {
    log.error(`mission ${missionId} aborted:`, errorMessage(error));
    try {
      return this.tracker.setMode(missionId, "FAILED", "mission-aborted");
    } catch (finalizeError) {
      throw new MissionStateUnavailableError(
        missionId,
        errorMessage(finalizeError),
      );
    }
  }

  private advance(
    missionId: MissionId,
    event: MissionEvent,
    reason?: FailureReason,
  ): void {
    const { mode } = this.tracker.get(missionId);
    this.tracker.setMode(missionId, transition(mode, event), reason);
  }

  private async resolveProtocol(
    mission: Mission,
    ctx: CallContext,
    log: Logger,
  ): Promise<Protocol | null> {
    const { missionId, projectId } = mission;
    try {
      const existing = await this.deps.protocols.get(projectId, ctx);
      this.advance(missionId, "protocol-found");
      log.debug(`using ${projectId} protocol v${existing.version}`);
      return existing;
    } catch (error) {
      if (!(error instanceof ProtocolNotFoundError)) {
        return this.failLookup(missionId, error, log);
      }
    }

    this.advance(missionId, "protocol-missing");
    try {
      const created = await this.deps.protocols.create(
        projectId,
        this.defaultSteps,
        ctx,
      );
      log.info(`created ${projectId} protocol v${created.version}`);
      this.advance(missionId, "protocol-created");
      return created;
    } catch (error) {
      if (!(error instanceof ProtocolAlreadyExistsError)) {
        return this.failLookup(missionId, error, log);
      }
    }

    // Another mission created it first; execute against the winner.
    try {
      const winner = await this.deps.protocols.get(projectId, ctx);
      log.debug(
        `${projectId} protocol v${winner.version} created concurrently`,
      );
      this.advance(missionId, "protocol-created");
      return winner;
    } catch (error) {
      return this.failLookup(missionId, error, log);
    }
  }

  private failLookup(missionId: MissionId, error: unknown, log: Logger): null {
    log.error("protocol store failed:", errorMessage(error));
    this.advance(missionId, "lookup-failed", "protocol-store-unreachable");
    return null;
  }

  private async checkAssignment(
    mission: Mission,
    ctx: CallContext,
    log: Logger,
  ): Promise<boolean> {
    const { missionId, employeeId, projectId } = mission;
    let verdict: AssignmentVerdict;
    try {
      verdict = await this.deps.assignments.checkAssignment(
        employeeId,
        projectId,
        ctx,
      );
    } catch (error) {
      if (!(error instanceof AssignmentDeniedError)) {
        log.error("assignment check failed:", errorMessage(error));
        this.advance(
          missionId,
          "assignment-unreachable",
          "assignment-unreachable",
        );
        return false;
      }
      verdict = { authorized: false, role: UNASSIGNED_ROLE };
    }

    this.tracker.recordAssignment(missionId, verdict);
    if (verdict.authorized) {
      return true;
    }

    log.warn(`${employeeId} is not authorized for ${projectId}`);
    this.advance(missionId, "assignment-denied");
    this.advance(missionId, "blocked-finalized", "unauthorized");
    return false;
  }

  private async executeSteps(
    mission: Mission,
    protocol: Protocol,
    ctx: CallContext,
    log: Logger,
  ): Promise<void> {
    const { missionId } = mission;
    for (const [stepIndex, step] of protocol.steps.entries()) {
      const outcome = await this.delegate(step, mission, ctx);
      this.tracker.appendStepResult(missionId, {
        stepIndex,
        kind: step.kind,
        status: outcome.status,
        detail: outcome.detail,
        ...(outcome.attempts !== undefined
          ? { attempts: outcome.attempts }
          : {}),
      });
      log.debug(
        `step ${stepIndex} ${step.kind}: ${outcome.status} ${outcome.detail}`,
      );

      if (outcome.status === "FAILURE" && step.fatalOnFailure) {
        log.warn(`fatal step ${stepIndex} (${step.kind}) failed`);
        this.advance(missionId, "fatal-step-failed", "fatal-step-failure");
        return;
      }
    }

    this.advance(missionId, "steps-exhausted");
  }

  private async delegate(
    step: StepSpec,
    mission: Mission,
    ctx: CallContext,
  ): Promise<WorkerOutcome> {
    const worker = this.deps.workers.resolve(step.kind);
    if (!worker) {
      return {
        status: "FAILURE",
        detail: `Unreachable: no worker registered for ${step.kind}`,
      };
    }

    try {
      return await worker.executeStep(step, mission.employeeId, {
        ...ctx,
        projectId: mission.projectId,
      });
    } catch (error) {
      return { status: "FAILURE", detail: errorMessage(error) };
    }
  }
}
