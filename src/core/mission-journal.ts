import fs from "node:fs";
import path from "node:path";
import type { Mission, MissionId } from "./types";

/**
 * Write-through snapshot of committed mission state, one JSON file per
 * mission. Status pollers in another process read these files.
 */
export class MissionJournal {
  constructor(private readonly rootDir: string) {}

  ensure(): void {
    fs.mkdirSync(path.join(this.rootDir, "missions"), { recursive: true });
  }

  missionDir(missionId: MissionId): string {
    return path.join(this.rootDir, "missions", missionId);
  }

  statePath(missionId: MissionId): string {
    return path.join(this.missionDir(missionId), "state.json");
  }

  save(mission: Mission): void {
    fs.mkdirSync(this.missionDir(mission.missionId), { recursive: true });
    // Write then rename so readers never observe a half-written file.
    const target = this.statePath(mission.missionId);
    const staging = `${target}.tmp`;
    fs.writeFileSync(staging, JSON.stringify(mission, null, 2));
    fs.renameSync(staging, target);
  }

  load(missionId: MissionId): Mission | null {
    const file = this.statePath(missionId);
    if (!fs.existsSync(file)) {
      return null;
    }

    return JSON.parse(fs.readFileSync(file, "utf8")) as Mission;
  }

  list(): Mission[] {
    const missionsDir = path.join(this.rootDir, "missions");
    if (!fs.existsSync(missionsDir)) {
      return [];
    }

    return fs
      .readdirSync(missionsDir)
      .flatMap((entry) => {
        const stateFile = path.join(missionsDir, entry, "state.json");
        if (!fs.existsSync(stateFile)) {
          return [];
        }
        return [JSON.parse(fs.readFileSync(stateFile, "utf8")) as Mission];
      })
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }
}
