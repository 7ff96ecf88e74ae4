import { MISSION_MODES, type Mission, type Protocol } from "../core/types";

export const buildOverviewLines = (missions: Mission[]): string[] => [
  `missions=${missions.length}`,
  ...MISSION_MODES.flatMap((mode) => {
    const count = missions.filter((mission) => mission.mode === mode).length;
    return count > 0 ? [`${mode.toLowerCase()}=${count}`] : [];
  }),
];

export const buildMissionLines = (missions: Mission[]): string[] =>
  missions.length > 0
    ? missions.map(
        (mission) =>
          `${mission.missionId}: ${mission.employeeId} -> ${mission.projectId} ${mission.mode}${mission.failureReason ? ` (${mission.failureReason})` : ""}`,
      )
    : ["No missions"];

export const buildMissionDetailLines = (mission: Mission): string[] => {
  const verdict = mission.assignmentVerdict;
  return [
    `mission: ${mission.missionId}`,
    `trace: ${mission.traceId}`,
    `employee: ${mission.employeeId}`,
    `project: ${mission.projectId}`,
    `mode: ${mission.mode}`,
    `protocol: ${mission.protocolVersion === null ? "none" : `v${mission.protocolVersion}`}`,
    `assignment: ${verdict ? `${verdict.authorized ? "authorized" : "denied"} (${verdict.role})` : "unknown"}`,
    ...(mission.failureReason ? [`failure: ${mission.failureReason}`] : []),
    `modes: ${mission.history.map((entry) => entry.mode).join(" -> ")}`,
    `steps: ${mission.stepResults.length}/${mission.stepCount}`,
    ...mission.stepResults.map(
      (result) =>
        `  [${result.stepIndex}] ${result.kind} ${result.status}: ${result.detail}`,
    ),
  ];
};

export const buildProtocolLines = (protocols: Protocol[]): string[] =>
  protocols.length > 0
    ? protocols.map(
        (protocol) =>
          `${protocol.projectId} v${protocol.version}: ${protocol.steps.map((step) => `${step.kind}${step.fatalOnFailure ? "!" : ""}`).join(", ")}`,
      )
    : ["No protocols"];
