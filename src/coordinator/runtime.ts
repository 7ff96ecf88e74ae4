import path from "node:path";
import { AssignmentStepWorker } from "../collaborators/assignment-step-worker";
import { ChatSpaceProvisioningWorker } from "../collaborators/chat-space-worker";
import { RosterAssignmentChecker } from "../collaborators/roster-assignment-checker";
import { SimulatedChatSpaceClient } from "../collaborators/simulated-chat-client";
import { WorkerRegistry } from "../collaborators/worker-registry";
import { MissionJournal } from "../core/mission-journal";
import { MissionStateTracker } from "../core/mission-tracker";
import { logger } from "../observability/logger";
import type { OnboardingConfig } from "../project/config";
import {
  ASSIGNMENT_CHECK,
  defaultProtocolSteps,
} from "../protocols/protocol-definition";
import { FileProtocolStore } from "../protocols/file-protocol-store";
import { loadProtocolDirectory, seedProtocols } from "../protocols/protocol-loader";
import { Coordinator } from "./coordinator";

export interface OnboardingRuntime {
  coordinator: Coordinator;
  protocols: FileProtocolStore;
  journal: MissionJournal;
}

/**
 * Wire the file-backed stores, roster checker and chat worker from
 * configuration, and seed protocols from the protocols directory.
 */
export const createRuntime = async (
  cwd: string,
  config: OnboardingConfig,
): Promise<OnboardingRuntime> => {
  const stateDir = path.resolve(cwd, config.stateDir);
  const protocols = new FileProtocolStore(stateDir);
  protocols.ensure();
  const journal = new MissionJournal(stateDir);
  journal.ensure();

  const definitions = await loadProtocolDirectory(
    path.resolve(cwd, config.protocolsDir),
  );
  const seeded = await seedProtocols(protocols, definitions);
  if (seeded.created.length + seeded.replaced.length > 0) {
    logger.protocols.info(
      `seeded protocols created=[${seeded.created.join(", ")}] replaced=[${seeded.replaced.join(", ")}]`,
    );
  }

  const assignments = new RosterAssignmentChecker(config.roster);
  const chatClient = new SimulatedChatSpaceClient(config.serviceAccountId);
  const workers = new WorkerRegistry()
    .register(ASSIGNMENT_CHECK, new AssignmentStepWorker(assignments))
    .register(
      "chat-*",
      new ChatSpaceProvisioningWorker(chatClient, {
        serviceAccountId: config.serviceAccountId,
        retry: config.retry,
      }),
    );
  logger.workers.debug(
    `workers registered for ${workers.patterns().join(", ")}`,
  );

  const coordinator = new Coordinator({
    protocols,
    assignments,
    workers,
    tracker: new MissionStateTracker(journal),
    defaultSteps: defaultProtocolSteps(config.defaultSpaces),
  });

  return { coordinator, protocols, journal };
};
