/**
 * Error taxonomy for the onboarding core. Each error carries a stable
 * `code` so callers can branch without string matching on messages.
 */
export abstract class OnboardingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ProtocolNotFoundError extends OnboardingError {
  constructor(projectId: string) {
    super(`No onboarding protocol for ${projectId}`, "PROTOCOL_NOT_FOUND", {
      projectId,
    });
  }
}

export class ProtocolAlreadyExistsError extends OnboardingError {
  constructor(projectId: string, version: number) {
    super(
      `Onboarding protocol for ${projectId} already exists (v${version})`,
      "PROTOCOL_ALREADY_EXISTS",
      { projectId, version },
    );
  }
}

export class ProtocolDefinitionError extends OnboardingError {
  constructor(source: string, errors: string[]) {
    super(
      `Invalid protocol definition in ${source}: ${errors.join("; ")}`,
      "PROTOCOL_INVALID",
      { source, errors },
    );
  }
}

export class MissionNotFoundError extends OnboardingError {
  constructor(missionId: string) {
    super(`Unknown mission: ${missionId}`, "MISSION_NOT_FOUND", { missionId });
  }
}

export class MissionAlreadyExistsError extends OnboardingError {
  constructor(missionId: string) {
    super(`Mission ${missionId} already exists`, "MISSION_ALREADY_EXISTS", {
      missionId,
    });
  }
}

/** Mission state could not be committed, so the mission could not finish. */
export class MissionStateUnavailableError extends OnboardingError {
  constructor(missionId: string, message: string) {
    super(
      `Mission ${missionId} state unavailable: ${message}`,
      "MISSION_STATE_UNAVAILABLE",
      { missionId },
    );
  }
}

export class InvalidTransitionError extends OnboardingError {
  constructor(from: string, to: string) {
    super(`Illegal mission transition ${from} -> ${to}`, "INVALID_TRANSITION", {
      from,
      to,
    });
  }
}

export class StepResultRejectedError extends OnboardingError {
  constructor(missionId: string, reason: string) {
    super(
      `Step result rejected for ${missionId}: ${reason}`,
      "STEP_RESULT_REJECTED",
      { missionId, reason },
    );
  }
}

/**
 * A collaborator (store, checker, worker) could not be reached or
 * answered with a transient failure.
 */
export class CollaboratorUnreachableError extends OnboardingError {
  constructor(collaborator: string, message: string, cause?: unknown) {
    super(`Unreachable: ${collaborator}: ${message}`, "COLLABORATOR_UNREACHABLE", {
      collaborator,
      ...(cause === undefined ? {} : { cause }),
    });
  }
}

export class AssignmentDeniedError extends OnboardingError {
  constructor(employeeId: string, projectId: string) {
    super(
      `Employee ${employeeId} is not assigned to ${projectId}`,
      "ASSIGNMENT_DENIED",
      { employeeId, projectId },
    );
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
