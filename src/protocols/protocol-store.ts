import {
  ProtocolAlreadyExistsError,
  ProtocolNotFoundError,
} from "../core/errors";
import type { CallContext, ProjectId, Protocol, StepSpec } from "../core/types";
import { validateSteps } from "./protocol-definition";

export interface CreateProtocolOptions {
  createdBy?: string;
}

/**
 * Read/write access to onboarding protocols keyed by project.
 *
 * `create` is first-writer-wins: when a protocol already exists for the
 * project it throws {@link ProtocolAlreadyExistsError}. `replace` always
 * writes a new version; stored versions are never edited. Both validate
 * the steps they are given.
 */
export interface ProtocolStoreGateway {
  get(projectId: ProjectId, ctx: CallContext): Promise<Protocol>;
  create(
    projectId: ProjectId,
    steps: StepSpec[],
    ctx: CallContext,
    options?: CreateProtocolOptions,
  ): Promise<Protocol>;
  replace(
    projectId: ProjectId,
    steps: StepSpec[],
    ctx: CallContext,
  ): Promise<Protocol>;
  list(): Promise<Protocol[]>;
}

export const cloneProtocol = (protocol: Protocol): Protocol =>
  structuredClone(protocol);

export class InMemoryProtocolStore implements ProtocolStoreGateway {
  private readonly versions = new Map<ProjectId, Protocol[]>();

  constructor(
    private readonly clock: () => string = () => new Date().toISOString(),
  ) {}

  async get(projectId: ProjectId, _ctx: CallContext): Promise<Protocol> {
    const latest = this.versions.get(projectId)?.at(-1);
    if (!latest) {
      throw new ProtocolNotFoundError(projectId);
    }
    return cloneProtocol(latest);
  }

  async create(
    projectId: ProjectId,
    steps: StepSpec[],
    _ctx: CallContext,
    options: CreateProtocolOptions = {},
  ): Promise<Protocol> {
    const existing = this.versions.get(projectId)?.at(-1);
    if (existing) {
      throw new ProtocolAlreadyExistsError(projectId, existing.version);
    }

    const protocol: Protocol = {
      projectId,
      version: 1,
      steps: structuredClone(validateSteps(projectId, steps)),
      createdAt: this.clock(),
      createdBy: options.createdBy ?? "coordinator",
    };
    this.versions.set(projectId, [protocol]);
    return cloneProtocol(protocol);
  }

  async replace(
    projectId: ProjectId,
    steps: StepSpec[],
    _ctx: CallContext,
  ): Promise<Protocol> {
    const history = this.versions.get(projectId);
    const latest = history?.at(-1);
    if (!history || !latest) {
      throw new ProtocolNotFoundError(projectId);
    }

    const protocol: Protocol = {
      projectId,
      version: latest.version + 1,
      steps: structuredClone(validateSteps(projectId, steps)),
      createdAt: this.clock(),
      createdBy: latest.createdBy,
    };
    history.push(protocol);
    return cloneProtocol(protocol);
  }

  async list(): Promise<Protocol[]> {
    return [...this.versions.values()]
      .flatMap((history) => history.slice(-1))
      .map(cloneProtocol)
      .sort((a, b) => a.projectId.localeCompare(b.projectId));
  }
}
