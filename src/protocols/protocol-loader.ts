import fs from "node:fs";
import path from "node:path";
import { nanoid } from "nanoid";
import { ProtocolNotFoundError } from "../core/errors";
import {
  type CallContext,
  type ProjectId,
  type Protocol,
  asMissionId,
  asProjectId,
  asTraceId,
} from "../core/types";
import { importModuleDefault } from "../project/load-module";
import {
  type ProtocolDefinition,
  validateProtocolDefinition,
} from "./protocol-definition";
import type { ProtocolStoreGateway } from "./protocol-store";

export interface SeedSummary {
  created: string[];
  replaced: string[];
  unchanged: string[];
}

/**
 * Load protocol definitions from a directory of `.ts`, `.js` or `.json`
 * files. Each file exports (or contains) one definition.
 */
export const loadProtocolDirectory = async (
  directory: string,
): Promise<ProtocolDefinition[]> => {
  if (!fs.existsSync(directory)) {
    return [];
  }

  const definitions: ProtocolDefinition[] = [];
  const entries = fs
    .readdirSync(directory)
    .filter((file) => [".ts", ".js", ".json"].includes(path.extname(file)))
    .sort();

  for (const entry of entries) {
    const modulePath = path.join(directory, entry);
    const loaded =
      path.extname(entry) === ".json"
        ? (JSON.parse(fs.readFileSync(modulePath, "utf8")) as unknown)
        : await importModuleDefault(modulePath);
    definitions.push(validateProtocolDefinition(entry, loaded));
  }

  return definitions;
};

const sameSteps = (a: unknown, b: unknown): boolean =>
  JSON.stringify(a) === JSON.stringify(b);

/** Context for store calls made outside any mission. */
export const seedContext = (): CallContext => ({
  traceId: asTraceId(nanoid()),
  missionId: asMissionId("protocol-seed"),
});

const findProtocol = async (
  store: ProtocolStoreGateway,
  projectId: ProjectId,
  ctx: CallContext,
): Promise<Protocol | null> => {
  try {
    return await store.get(projectId, ctx);
  } catch (error) {
    if (error instanceof ProtocolNotFoundError) {
      return null;
    }
    throw error;
  }
};

/**
 * Write definitions into a store. Missing projects get version 1; a
 * project whose steps changed gets a new version; identical steps are
 * left alone.
 */
export const seedProtocols = async (
  store: ProtocolStoreGateway,
  definitions: ProtocolDefinition[],
  ctx: CallContext = seedContext(),
): Promise<SeedSummary> => {
  const summary: SeedSummary = { created: [], replaced: [], unchanged: [] };

  for (const definition of definitions) {
    const projectId = asProjectId(definition.projectId);
    const current = await findProtocol(store, projectId, ctx);
    if (!current) {
      await store.create(projectId, definition.steps, ctx, {
        createdBy: definition.createdBy ?? "seed",
      });
      summary.created.push(definition.projectId);
    } else if (sameSteps(current.steps, definition.steps)) {
      summary.unchanged.push(definition.projectId);
    } else {
      await store.replace(projectId, definition.steps, ctx);
      summary.replaced.push(definition.projectId);
    }
  }

  return summary;
};
