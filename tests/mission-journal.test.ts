import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { MissionJournal } from "../src/core/mission-journal";
import {
  type Mission,
  asEmployeeId,
  asMissionId,
  asProjectId,
  asTraceId,
} from "../src/core/types";

const mission = (id: string, createdAt: string): Mission => ({
  missionId: asMissionId(id),
  traceId: asTraceId(`trace-${id}`),
  employeeId: asEmployeeId("maria.rosa@enterprise.com"),
  projectId: asProjectId("PROJ-ALPHA"),
  mode: "PENDING",
  protocolVersion: null,
  stepCount: 0,
  assignmentVerdict: null,
  stepResults: [],
  failureReason: null,
  history: [{ mode: "PENDING", enteredAt: createdAt }],
  createdAt,
  updatedAt: createdAt,
  completedAt: null,
});

describe("MissionJournal", () => {
  it("returns null and empty lists for missing state", () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "onboarding-journal-"));
    const journal = new MissionJournal(root);

    expect(journal.load(asMissionId("missing"))).toBeNull();
    expect(journal.list()).toEqual([]);
  });

  it("ignores mission directories without a state file", () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "onboarding-journal-"));
    const journal = new MissionJournal(root);
    journal.ensure();
    fs.mkdirSync(path.join(root, "missions", "dangling"), { recursive: true });

    expect(journal.list()).toEqual([]);
  });

  it("saves, loads and lists missions by creation time", () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "onboarding-journal-"));
    const journal = new MissionJournal(root);
    const later = mission("mission-a", "2026-01-02T00:00:00Z");
    const earlier = mission("mission-z", "2026-01-01T00:00:00Z");

    journal.save(later);
    journal.save(earlier);

    expect(journal.load(later.missionId)).toEqual(later);
    expect(journal.list().map((entry) => entry.missionId)).toEqual([
      "mission-z",
      "mission-a",
    ]);
    expect(fs.existsSync(`${journal.statePath(later.missionId)}.tmp`)).toBe(
      false,
    );
  });

  it("overwrites the snapshot on each save", () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "onboarding-journal-"));
    const journal = new MissionJournal(root);
    const first = mission("mission-a", "2026-01-01T00:00:00Z");
    journal.save(first);
    journal.save({ ...first, mode: "EXECUTION" });

    expect(journal.load(first.missionId)?.mode).toBe("EXECUTION");
  });
});
