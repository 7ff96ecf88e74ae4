export type Brand<T, B extends string> = T & { readonly __brand: B };

export type MissionId = Brand<string, "MissionId">;
export type TraceId = Brand<string, "TraceId">;
export type ProjectId = Brand<string, "ProjectId">;
export type EmployeeId = Brand<string, "EmployeeId">;

export const asMissionId = (value: string): MissionId => value as MissionId;
export const asTraceId = (value: string): TraceId => value as TraceId;
export const asProjectId = (value: string): ProjectId => value as ProjectId;
export const asEmployeeId = (value: string): EmployeeId =>
  value as EmployeeId;

export const MISSION_MODES = [
  "PENDING",
  "PROTOCOL_CREATION",
  "EXECUTION",
  "BLOCKED",
  "COMPLETED",
  "FAILED",
] as const;

export type MissionMode = (typeof MISSION_MODES)[number];

export const TERMINAL_MODES: ReadonlySet<MissionMode> = new Set<MissionMode>([
  "COMPLETED",
  "FAILED",
]);

export interface StepSpec {
  kind: string;
  targetSystem: string;
  parameters: Record<string, unknown>;
  fatalOnFailure: boolean;
}

export interface Protocol {
  projectId: ProjectId;
  version: number;
  steps: StepSpec[];
  createdAt: string;
  createdBy: string;
}

export type StepStatus = "SUCCESS" | "FAILURE" | "SKIPPED";

export interface StepResult {
  stepIndex: number;
  kind: string;
  status: StepStatus;
  detail: string;
  attempts?: number;
  at: string;
}

export const UNASSIGNED_ROLE = "Unassigned";

export interface AssignmentVerdict {
  authorized: boolean;
  role: string;
}

export type FailureReason =
  | "unauthorized"
  | "fatal-step-failure"
  | "protocol-store-unreachable"
  | "assignment-unreachable"
  | "mission-aborted";

export interface MissionModeHistory {
  mode: MissionMode;
  enteredAt: string;
  exitedAt?: string;
}

export interface Mission {
  missionId: MissionId;
  traceId: TraceId;
  employeeId: EmployeeId;
  projectId: ProjectId;
  mode: MissionMode;
  protocolVersion: number | null;
  stepCount: number;
  assignmentVerdict: AssignmentVerdict | null;
  stepResults: StepResult[];
  failureReason: FailureReason | null;
  history: MissionModeHistory[];
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

/** Correlation carried on every collaborator call. */
export interface CallContext {
  traceId: TraceId;
  missionId: MissionId;
}
