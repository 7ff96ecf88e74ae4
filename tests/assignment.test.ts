import { describe, expect, it } from "vitest";
import { AssignmentStepWorker } from "../src/collaborators/assignment-step-worker";
import type { AssignmentChecker } from "../src/collaborators/contracts";
import { RosterAssignmentChecker } from "../src/collaborators/roster-assignment-checker";
import {
  AssignmentDeniedError,
  CollaboratorUnreachableError,
} from "../src/core/errors";
import {
  asEmployeeId,
  asMissionId,
  asProjectId,
  asTraceId,
} from "../src/core/types";
import { assignmentCheck } from "../src/protocols/protocol-definition";

const alpha = asProjectId("PROJ-ALPHA");
const ctx = {
  traceId: asTraceId("trace-assign"),
  missionId: asMissionId("mission-assign"),
};

const checker = new RosterAssignmentChecker({
  "PROJ-ALPHA": [
    { email: "Maria.Rosa@enterprise.com", role: "Contributor", status: "Active" },
    { email: "former.member@enterprise.com", role: "Lead", status: "Inactive" },
  ],
});

const failingChecker = (error: Error): AssignmentChecker => ({
  checkAssignment: async () => {
    throw error;
  },
});

describe("RosterAssignmentChecker", () => {
  it("authorizes active members case-insensitively", async () => {
    expect(
      await checker.checkAssignment(
        asEmployeeId("maria.rosa@ENTERPRISE.com"),
        alpha,
        ctx,
      ),
    ).toEqual({ authorized: true, role: "Contributor" });
  });

  it("never reads inherited object members as project rosters", async () => {
    const empty = new RosterAssignmentChecker({});
    for (const projectId of ["constructor", "toString", "__proto__"]) {
      expect(
        await empty.checkAssignment(
          asEmployeeId("maria.rosa@enterprise.com"),
          asProjectId(projectId),
          ctx,
        ),
      ).toEqual({ authorized: false, role: "Unassigned" });
    }
  });

  it("treats inactive and unknown people as unassigned", async () => {
    const unassigned = { authorized: false, role: "Unassigned" };
    expect(
      await checker.checkAssignment(
        asEmployeeId("former.member@enterprise.com"),
        alpha,
        ctx,
      ),
    ).toEqual(unassigned);
    expect(
      await checker.checkAssignment(
        asEmployeeId("maria.rosa@enterprise.com"),
        asProjectId("PROJ-UNKNOWN"),
        ctx,
      ),
    ).toEqual(unassigned);
  });
});

describe("AssignmentStepWorker", () => {
  const stepCtx = { ...ctx, projectId: alpha };

  it("succeeds with the assigned role", async () => {
    const worker = new AssignmentStepWorker(checker);
    expect(
      await worker.executeStep(
        assignmentCheck(),
        asEmployeeId("maria.rosa@enterprise.com"),
        stepCtx,
      ),
    ).toEqual({ status: "SUCCESS", detail: "assigned as Contributor" });
  });

  it("fails for unassigned employees", async () => {
    const worker = new AssignmentStepWorker(checker);
    expect(
      await worker.executeStep(
        assignmentCheck(),
        asEmployeeId("nobody@enterprise.com"),
        stepCtx,
      ),
    ).toEqual({ status: "FAILURE", detail: "not assigned to PROJ-ALPHA" });
  });

  it("turns an explicit denial into a failed step", async () => {
    const worker = new AssignmentStepWorker(
      failingChecker(
        new AssignmentDeniedError("nobody@enterprise.com", "PROJ-ALPHA"),
      ),
    );
    expect(
      await worker.executeStep(
        assignmentCheck(),
        asEmployeeId("nobody@enterprise.com"),
        stepCtx,
      ),
    ).toEqual({
      status: "FAILURE",
      detail: "Employee nobody@enterprise.com is not assigned to PROJ-ALPHA",
    });
  });

  it("propagates unreachable checkers", async () => {
    const worker = new AssignmentStepWorker(
      failingChecker(
        new CollaboratorUnreachableError("assignment-platform", "timed out"),
      ),
    );
    await expect(
      worker.executeStep(
        assignmentCheck(),
        asEmployeeId("maria.rosa@enterprise.com"),
        stepCtx,
      ),
    ).rejects.toThrow("Unreachable: assignment-platform: timed out");
  });
});
