import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ProtocolDefinitionError } from "../core/errors";
import type { StepSpec } from "../core/types";

export const StepSpecSchema = Type.Object({
  kind: Type.String({ minLength: 1 }),
  targetSystem: Type.String({ minLength: 1 }),
  parameters: Type.Record(Type.String(), Type.Unknown()),
  fatalOnFailure: Type.Boolean(),
});

export const ProtocolDefinitionSchema = Type.Object({
  projectId: Type.String({ minLength: 1 }),
  createdBy: Type.Optional(Type.String()),
  steps: Type.Array(StepSpecSchema, { minItems: 1 }),
});

export type ProtocolDefinition = Static<typeof ProtocolDefinitionSchema>;

export const ASSIGNMENT_CHECK = "assignment-check";
export const CHAT_PROVISION = "chat-provision";

export const defineProtocol = (
  protocol: ProtocolDefinition,
): ProtocolDefinition => protocol;

export const assignmentCheck = (
  options: { fatal?: boolean } = {},
): StepSpec => ({
  kind: ASSIGNMENT_CHECK,
  targetSystem: "assignment-platform",
  parameters: {},
  fatalOnFailure: options.fatal ?? true,
});

/**
 * Add the employee to each listed chat space. The worker stops at the
 * first space that fails permanently.
 */
export const chatProvision = (options: {
  spaces: string[];
  fatal?: boolean;
}): StepSpec => ({
  kind: CHAT_PROVISION,
  targetSystem: "google-chat",
  parameters: { spaces: [...options.spaces] },
  fatalOnFailure: options.fatal ?? false,
});

/** Step list written for a project that has no protocol yet. */
export const defaultProtocolSteps = (defaultSpaces: string[]): StepSpec[] => [
  assignmentCheck({ fatal: true }),
  chatProvision({ spaces: defaultSpaces, fatal: true }),
];

const collectErrors = (schema: TSchema, value: unknown): string[] =>
  [...Value.Errors(schema, value)].map(
    (error) => `${error.path || "/"}: ${error.message}`,
  );

export const validateSteps = (source: string, steps: unknown): StepSpec[] => {
  if (!Array.isArray(steps)) {
    throw new ProtocolDefinitionError(source, ["steps must be an array"]);
  }

  const valid: StepSpec[] = [];
  const errors: string[] = [];
  steps.forEach((step: unknown, index) => {
    if (Value.Check(StepSpecSchema, step)) {
      valid.push({ ...step, parameters: { ...step.parameters } });
      return;
    }
    for (const message of collectErrors(StepSpecSchema, step)) {
      errors.push(`steps[${index}]${message}`);
    }
  });

  if (errors.length > 0) {
    throw new ProtocolDefinitionError(source, errors);
  }
  return valid;
};

export const validateProtocolDefinition = (
  source: string,
  value: unknown,
): ProtocolDefinition => {
  if (!Value.Check(ProtocolDefinitionSchema, value)) {
    throw new ProtocolDefinitionError(
      source,
      collectErrors(ProtocolDefinitionSchema, value),
    );
  }
  return value;
};
