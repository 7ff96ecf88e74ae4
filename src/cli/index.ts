/**
 * onboard CLI
 *
 * Commands:
 *   run <employee> <project>  - run one onboarding mission to completion
 *   status <missionId>        - print a recorded mission
 *   protocols                 - list stored protocols
 */

import { Command } from "commander";
import { createRuntime } from "../coordinator/runtime";
import { asEmployeeId, asMissionId, asProjectId } from "../core/types";
import {
  buildMissionDetailLines,
  buildMissionLines,
  buildOverviewLines,
  buildProtocolLines,
} from "../observability/dashboard";
import { logger, setLogLevel } from "../observability/logger";
import { loadOnboardingConfig } from "../project/config";

export interface CliIo {
  cwd: string;
  out: (line: string) => void;
  setExitCode: (code: number) => void;
}

const defaultIo: CliIo = {
  cwd: process.cwd(),
  out: (line) => process.stdout.write(`${line}\n`),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

const prepare = async (io: CliIo, verbose: boolean) => {
  const config = await loadOnboardingConfig(io.cwd);
  setLogLevel(verbose ? "debug" : config.logLevel);
  return createRuntime(io.cwd, config);
};

export const buildProgram = (io: CliIo = defaultIo): Command => {
  const program = new Command();

  program
    .name("onboard")
    .description("Coordinate employee onboarding missions")
    .version("0.1.0");

  program
    .command("run")
    .description("Run an onboarding mission for an employee on a project")
    .argument("<employee>", "Employee email")
    .argument("<project>", "Project id")
    .option("--verbose", "Enable debug logging", false)
    .action(
      async (employee: string, project: string, options: { verbose: boolean }) => {
        const runtime = await prepare(io, options.verbose);
        const mission = await runtime.coordinator.run(
          asEmployeeId(employee),
          asProjectId(project),
        );
        for (const line of buildMissionDetailLines(mission)) {
          io.out(line);
        }
        if (mission.mode === "FAILED") {
          io.setExitCode(1);
        }
      },
    );

  program
    .command("status")
    .description("Show a recorded mission, or all missions")
    .argument("[missionId]", "Mission id")
    .action(async (missionId: string | undefined) => {
      const runtime = await prepare(io, false);
      if (!missionId) {
        const missions = runtime.journal.list();
        for (const line of [
          ...buildOverviewLines(missions),
          ...buildMissionLines(missions),
        ]) {
          io.out(line);
        }
        return;
      }

      const mission = runtime.journal.load(asMissionId(missionId));
      if (!mission) {
        logger.cli.error(`Unknown mission: ${missionId}`);
        io.setExitCode(1);
        return;
      }
      for (const line of buildMissionDetailLines(mission)) {
        io.out(line);
      }
    });

  program
    .command("protocols")
    .description("List stored onboarding protocols")
    .action(async () => {
      const runtime = await prepare(io, false);
      for (const line of buildProtocolLines(await runtime.protocols.list())) {
        io.out(line);
      }
    });

  return program;
};
