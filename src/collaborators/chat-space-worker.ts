import type { CallContext, EmployeeId, StepSpec } from "../core/types";
import { logger, withTrace } from "../observability/logger";
import type {
  ProvisioningWorker,
  StepContext,
  WorkerOutcome,
} from "./contracts";
import { type RetryPolicy, type Sleep, retryWhile } from "./retry";

export interface ChatMemberRequest {
  spaceName: string;
  employeeEmail: string;
  serviceAccountId: string;
}

export interface ChatApiResponse {
  status: number;
  message: string;
  resourceName?: string;
}

export interface ChatSpaceClient {
  addMember(
    request: ChatMemberRequest,
    ctx: CallContext,
  ): Promise<ChatApiResponse>;
}

export interface ChatSpaceWorkerOptions {
  serviceAccountId: string;
  retry: RetryPolicy;
  sleep?: Sleep;
}

type SpaceOutcome =
  | { ok: true; attempts: number }
  | { ok: false; attempts: number; detail: string };

const readSpaces = (parameters: Record<string, unknown>): string[] | null => {
  const spaces = parameters.spaces;
  if (spaces === undefined) {
    return [];
  }
  if (
    !Array.isArray(spaces) ||
    !spaces.every((space): space is string => typeof space === "string")
  ) {
    return null;
  }
  return spaces;
};

/**
 * Adds the employee to every chat space listed in `parameters.spaces`,
 * acting as the configured service account. Transient API statuses are
 * retried with backoff; the step fails at the first space that cannot be
 * provisioned.
 */
export class ChatSpaceProvisioningWorker implements ProvisioningWorker {
  constructor(
    private readonly client: ChatSpaceClient,
    private readonly options: ChatSpaceWorkerOptions,
  ) {}

  async executeStep(
    step: StepSpec,
    employeeId: EmployeeId,
    ctx: StepContext,
  ): Promise<WorkerOutcome> {
    const spaces = readSpaces(step.parameters);
    if (spaces === null) {
      return {
        status: "FAILURE",
        detail: "parameters.spaces must be a list of space names",
        attempts: 0,
      };
    }
    if (spaces.length === 0) {
      return {
        status: "SKIPPED",
        detail: "no spaces to provision",
        attempts: 0,
      };
    }

    const log = withTrace(logger.workers, ctx.traceId);
    let attempts = 0;
    for (const spaceName of spaces) {
      const outcome = await this.addToSpace(spaceName, employeeId, ctx);
      attempts += outcome.attempts;
      if (!outcome.ok) {
        log.warn(`chat provisioning failed: ${outcome.detail}`);
        return { status: "FAILURE", detail: outcome.detail, attempts };
      }
      log.debug(
        `added ${employeeId} to ${spaceName} (attempts=${outcome.attempts})`,
      );
    }

    return {
      status: "SUCCESS",
      detail: `added ${employeeId} to ${spaces.join(", ")}`,
      attempts,
    };
  }

  private async addToSpace(
    spaceName: string,
    employeeId: EmployeeId,
    ctx: CallContext,
  ): Promise<SpaceOutcome> {
    const { retry, serviceAccountId, sleep } = this.options;
    const { value, attempts } = await retryWhile(
      () =>
        this.client.addMember(
          { spaceName, employeeEmail: employeeId, serviceAccountId },
          ctx,
        ),
      (response) => retry.retryableStatuses.includes(response.status),
      retry,
      sleep,
    );

    if (value.status >= 200 && value.status < 300) {
      return { ok: true, attempts };
    }

    const detail = `${spaceName}: ${value.status} ${value.message}`;
    if (retry.retryableStatuses.includes(value.status)) {
      return {
        ok: false,
        attempts,
        detail: `Unreachable: google-chat: ${detail} after ${attempts} attempts`,
      };
    }
    return { ok: false, attempts, detail };
  }
}
