import { describe, expect, it } from "vitest";
import { ProtocolDefinitionError } from "../src/core/errors";
import {
  ASSIGNMENT_CHECK,
  CHAT_PROVISION,
  assignmentCheck,
  chatProvision,
  defaultProtocolSteps,
  defineProtocol,
  validateProtocolDefinition,
  validateSteps,
} from "../src/protocols/protocol-definition";

const captureErrors = (run: () => unknown): string[] => {
  try {
    run();
  } catch (error) {
    if (error instanceof ProtocolDefinitionError) {
      const { errors } = error.metadata;
      return Array.isArray(errors) ? errors.map(String) : [];
    }
    throw error;
  }
  throw new Error("expected a ProtocolDefinitionError");
};

describe("protocol definition", () => {
  it("builds step specs with fatal defaults per kind", () => {
    expect(assignmentCheck()).toEqual({
      kind: ASSIGNMENT_CHECK,
      targetSystem: "assignment-platform",
      parameters: {},
      fatalOnFailure: true,
    });
    expect(chatProvision({ spaces: ["spaces/ALPHA-DEV"] })).toEqual({
      kind: CHAT_PROVISION,
      targetSystem: "google-chat",
      parameters: { spaces: ["spaces/ALPHA-DEV"] },
      fatalOnFailure: false,
    });
  });

  it("copies the space list instead of sharing it", () => {
    const spaces = ["spaces/A"];
    const step = chatProvision({ spaces });
    spaces.push("spaces/B");

    expect(step.parameters.spaces).toEqual(["spaces/A"]);
  });

  it("writes fatal assignment and chat steps by default", () => {
    expect(
      defaultProtocolSteps(["spaces/ANNOUNCEMENTS"]).map((step) => [
        step.kind,
        step.fatalOnFailure,
      ]),
    ).toEqual([
      ["assignment-check", true],
      ["chat-provision", true],
    ]);
  });

  it("accepts well-formed definitions", () => {
    const definition = defineProtocol({
      projectId: "PROJ-ALPHA",
      steps: [assignmentCheck()],
    });

    expect(validateProtocolDefinition("alpha.ts", definition)).toBe(definition);
  });

  it("rejects definitions without steps", () => {
    expect(() =>
      validateProtocolDefinition("empty.json", { projectId: "X", steps: [] }),
    ).toThrow(ProtocolDefinitionError);
    expect(() => validateProtocolDefinition("bad.json", "nope")).toThrow(
      /^Invalid protocol definition in bad\.json: /,
    );
  });

  it("validates step lists and reports the failing index", () => {
    expect(validateSteps("input", [assignmentCheck()])).toEqual([
      assignmentCheck(),
    ]);

    const errors = captureErrors(() =>
      validateSteps("input", [
        assignmentCheck(),
        { kind: "", targetSystem: "x", parameters: {}, fatalOnFailure: true },
      ]),
    );
    expect(errors.length).toBeGreaterThan(0);
    expect(errors.every((message) => message.startsWith("steps[1]/kind"))).toBe(
      true,
    );
  });

  it("requires an array of steps", () => {
    expect(captureErrors(() => validateSteps("input", { kind: "x" }))).toEqual([
      "steps must be an array",
    ]);
  });
});
