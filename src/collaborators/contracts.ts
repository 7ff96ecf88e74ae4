import type {
  AssignmentVerdict,
  CallContext,
  EmployeeId,
  ProjectId,
  StepSpec,
  StepStatus,
} from "../core/types";

/**
 * Answers whether an employee is assigned to a project, and in which
 * role. Implementations may throw `CollaboratorUnreachableError` or
 * `AssignmentDeniedError`.
 */
export interface AssignmentChecker {
  checkAssignment(
    employeeId: EmployeeId,
    projectId: ProjectId,
    ctx: CallContext,
  ): Promise<AssignmentVerdict>;
}

export interface WorkerOutcome {
  status: StepStatus;
  detail: string;
  attempts?: number;
}

export type StepContext = CallContext & { projectId: ProjectId };

/** Executes one idempotent step against a downstream system. */
export interface ProvisioningWorker {
  executeStep(
    step: StepSpec,
    employeeId: EmployeeId,
    ctx: StepContext,
  ): Promise<WorkerOutcome>;
}
