import fs from "node:fs";
import path from "node:path";
import { nanoid } from "nanoid";
import {
  CollaboratorUnreachableError,
  ProtocolAlreadyExistsError,
  ProtocolNotFoundError,
  errorMessage,
} from "../core/errors";
import {
  type CallContext,
  type ProjectId,
  type Protocol,
  type StepSpec,
  asProjectId,
} from "../core/types";
import { validateSteps } from "./protocol-definition";
import type {
  CreateProtocolOptions,
  ProtocolStoreGateway,
} from "./protocol-store";

const VERSION_FILE = /^v(\d+)\.json$/;

const isAlreadyExists = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "EEXIST";

/**
 * Protocol store on the local filesystem:
 * `<root>/protocols/<projectId>/v<version>.json`. Each version is written
 * to a staging file and then hard-linked into place, so readers never see
 * a partial file and exactly one of several concurrent writers of the same
 * version wins.
 */
export class FileProtocolStore implements ProtocolStoreGateway {
  constructor(
    private readonly rootDir: string,
    private readonly clock: () => string = () => new Date().toISOString(),
  ) {}

  ensure(): void {
    fs.mkdirSync(path.join(this.rootDir, "protocols"), { recursive: true });
  }

  projectDir(projectId: ProjectId): string {
    // Dots are escaped too so "." and ".." stay inside protocols/.
    const segment = encodeURIComponent(projectId).replace(/\./g, "%2E");
    return path.join(this.rootDir, "protocols", segment);
  }

  async get(projectId: ProjectId, _ctx: CallContext): Promise<Protocol> {
    const latest = this.latestVersion(projectId);
    if (latest === 0) {
      throw new ProtocolNotFoundError(projectId);
    }
    return this.read(projectId, latest);
  }

  async create(
    projectId: ProjectId,
    steps: StepSpec[],
    _ctx: CallContext,
    options: CreateProtocolOptions = {},
  ): Promise<Protocol> {
    const latest = this.latestVersion(projectId);
    if (latest > 0) {
      throw new ProtocolAlreadyExistsError(projectId, latest);
    }

    return this.write({
      projectId,
      version: 1,
      steps: structuredClone(validateSteps(projectId, steps)),
      createdAt: this.clock(),
      createdBy: options.createdBy ?? "coordinator",
    });
  }

  async replace(
    projectId: ProjectId,
    steps: StepSpec[],
    ctx: CallContext,
  ): Promise<Protocol> {
    const current = await this.get(projectId, ctx);
    return this.write({
      projectId,
      version: current.version + 1,
      steps: structuredClone(validateSteps(projectId, steps)),
      createdAt: this.clock(),
      createdBy: current.createdBy,
    });
  }

  async list(): Promise<Protocol[]> {
    const protocolsDir = path.join(this.rootDir, "protocols");
    if (!fs.existsSync(protocolsDir)) {
      return [];
    }

    const protocols: Protocol[] = [];
    for (const entry of fs.readdirSync(protocolsDir)) {
      const projectId = asProjectId(decodeURIComponent(entry));
      const latest = this.latestVersion(projectId);
      if (latest > 0) {
        protocols.push(this.read(projectId, latest));
      }
    }
    return protocols.sort((a, b) => a.projectId.localeCompare(b.projectId));
  }

  private latestVersion(projectId: ProjectId): number {
    const dir = this.projectDir(projectId);
    if (!fs.existsSync(dir)) {
      return 0;
    }

    return fs.readdirSync(dir).reduce((max, file) => {
      const match = VERSION_FILE.exec(file);
      return match ? Math.max(max, Number(match[1])) : max;
    }, 0);
  }

  private read(projectId: ProjectId, version: number): Protocol {
    const file = path.join(this.projectDir(projectId), `v${version}.json`);
    try {
      return JSON.parse(fs.readFileSync(file, "utf8")) as Protocol;
    } catch (error) {
      throw new CollaboratorUnreachableError(
        "protocol-store",
        `cannot read ${file}: ${errorMessage(error)}`,
      );
    }
  }

  private write(protocol: Protocol): Protocol {
    const dir = this.projectDir(protocol.projectId);
    fs.mkdirSync(dir, { recursive: true });
    const file = path.join(dir, `v${protocol.version}.json`);
    const staging = path.join(dir, `.v${protocol.version}.${nanoid(8)}.tmp`);
    try {
      fs.writeFileSync(staging, JSON.stringify(protocol, null, 2));
      fs.linkSync(staging, file);
    } catch (error) {
      if (isAlreadyExists(error)) {
        throw new ProtocolAlreadyExistsError(
          protocol.projectId,
          protocol.version,
        );
      }
      throw new CollaboratorUnreachableError(
        "protocol-store",
        `cannot write ${file}: ${errorMessage(error)}`,
      );
    } finally {
      fs.rmSync(staging, { force: true });
    }
    return protocol;
  }
}
