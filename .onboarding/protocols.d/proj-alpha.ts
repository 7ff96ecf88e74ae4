import {
  assignmentCheck,
  chatProvision,
  defineProtocol,
} from "../../src/protocols/protocol-definition";

/** Onboarding for PROJ-ALPHA: verify the assignment, then join team chat. */
export default defineProtocol({
  projectId: "PROJ-ALPHA",
  createdBy: "platform-team",
  steps: [
    assignmentCheck(),
    chatProvision({ spaces: ["spaces/ALPHA-GENERAL", "spaces/ALPHA-DEV"] }),
  ],
});
