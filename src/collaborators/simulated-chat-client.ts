import type { CallContext } from "../core/types";
import type {
  ChatApiResponse,
  ChatMemberRequest,
  ChatSpaceClient,
} from "./chat-space-worker";

export interface SimulatedChatCall extends ChatMemberRequest {
  traceId: string;
}

/**
 * Deterministic stand-in for the chat membership API.
 *
 * - a service account other than the authorized one gets 403
 * - `spaces/FAIL_TRANSIENT*` answers 503 for `transientAttempts` calls
 *   per space, then succeeds
 * - `spaces/FAIL_PERMANENT*` answers 404
 * - anything else succeeds
 */
export class SimulatedChatSpaceClient implements ChatSpaceClient {
  readonly calls: SimulatedChatCall[] = [];
  private readonly transientSeen = new Map<string, number>();

  constructor(
    private readonly authorizedServiceAccountId: string,
    private readonly transientAttempts = Number.POSITIVE_INFINITY,
  ) {}

  async addMember(
    request: ChatMemberRequest,
    ctx: CallContext,
  ): Promise<ChatApiResponse> {
    this.calls.push({ ...request, traceId: ctx.traceId });

    if (request.serviceAccountId !== this.authorizedServiceAccountId) {
      return {
        status: 403,
        message: `service account mismatch, expected ${this.authorizedServiceAccountId}`,
      };
    }

    if (request.spaceName.startsWith("spaces/FAIL_TRANSIENT")) {
      const seen = (this.transientSeen.get(request.spaceName) ?? 0) + 1;
      this.transientSeen.set(request.spaceName, seen);
      if (seen <= this.transientAttempts) {
        return { status: 503, message: "chat service temporarily unavailable" };
      }
    }

    if (request.spaceName.startsWith("spaces/FAIL_PERMANENT")) {
      return { status: 404, message: "space not found" };
    }

    return {
      status: 200,
      message: `membership created for ${request.employeeEmail}`,
      resourceName: `${request.spaceName}/members/${request.employeeEmail}`,
    };
  }
}
