import {
  type AssignmentVerdict,
  type CallContext,
  type EmployeeId,
  type ProjectId,
  UNASSIGNED_ROLE,
} from "../core/types";
import type { AssignmentChecker } from "./contracts";

export interface RosterEntry {
  email: string;
  role: string;
  status: "Active" | "Inactive";
}

/** Project id to the people assigned to it. */
export type Roster = Record<string, RosterEntry[]>;

/**
 * Assignment Checker over a static roster. Emails compare
 * case-insensitively and only active entries count.
 */
export class RosterAssignmentChecker implements AssignmentChecker {
  constructor(private readonly roster: Roster) {}

  async checkAssignment(
    employeeId: EmployeeId,
    projectId: ProjectId,
    _ctx: CallContext,
  ): Promise<AssignmentVerdict> {
    const email = employeeId.toLowerCase();
    const entries = Object.hasOwn(this.roster, projectId)
      ? this.roster[projectId]
      : [];
    const match = entries.find(
      (entry) => entry.status === "Active" && entry.email.toLowerCase() === email,
    );

    return match
      ? { authorized: true, role: match.role }
      : { authorized: false, role: UNASSIGNED_ROLE };
  }
}
