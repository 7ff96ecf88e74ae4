import { AssignmentDeniedError } from "../core/errors";
import type { EmployeeId, StepSpec } from "../core/types";
import type {
  AssignmentChecker,
  ProvisioningWorker,
  StepContext,
  WorkerOutcome,
} from "./contracts";

/** Runs `assignment-check` steps by asking the Assignment Checker again. */
export class AssignmentStepWorker implements ProvisioningWorker {
  constructor(private readonly checker: AssignmentChecker) {}

  async executeStep(
    _step: StepSpec,
    employeeId: EmployeeId,
    ctx: StepContext,
  ): Promise<WorkerOutcome> {
    try {
      const verdict = await this.checker.checkAssignment(
        employeeId,
        ctx.projectId,
        ctx,
      );
      return verdict.authorized
        ? { status: "SUCCESS", detail: `assigned as ${verdict.role}` }
        : { status: "FAILURE", detail: `not assigned to ${ctx.projectId}` };
    } catch (error) {
      if (error instanceof AssignmentDeniedError) {
        return { status: "FAILURE", detail: error.message };
      }
      throw error;
    }
  }
}
