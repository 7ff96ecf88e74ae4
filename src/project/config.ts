import fs from "node:fs";
import path from "node:path";
import type {
  Roster,
  RosterEntry,
} from "../collaborators/roster-assignment-checker";
import { type RetryPolicy, defaultRetryPolicy } from "../collaborators/retry";
import {
  type LogLevelName,
  isLogLevelName,
  logger,
} from "../observability/logger";
import { importModuleDefault } from "./load-module";

export interface OnboardingConfig {
  /** Service account the chat worker acts as. */
  serviceAccountId: string;
  /** Chat spaces written into protocols created on demand. */
  defaultSpaces: string[];
  roster: Roster;
  retry: RetryPolicy;
  logLevel: LogLevelName;
  /** Directory for mission snapshots and file-backed protocols. */
  stateDir: string;
  protocolsDir: string;
}

export const defaultOnboardingConfig: OnboardingConfig = {
  serviceAccountId: "onboarding-provisioner",
  defaultSpaces: [],
  roster: {},
  retry: defaultRetryPolicy,
  logLevel: "warn",
  stateDir: ".onboarding/state",
  protocolsDir: ".onboarding/protocols.d",
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((v: unknown) => typeof v === "string");

const isNumberArray = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((v: unknown) => typeof v === "number");

const isNonNegative = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value) && value >= 0;

const normalizeRosterEntry = (entry: unknown): RosterEntry | null => {
  if (!isRecord(entry)) return null;
  if (typeof entry.email !== "string" || typeof entry.role !== "string")
    return null;
  return {
    email: entry.email,
    role: entry.role,
    status: entry.status === "Inactive" ? "Inactive" : "Active",
  };
};

// fromEntries defines own properties, so a "__proto__" project id stays data.
const normalizeRoster = (raw: unknown): Roster => {
  if (!isRecord(raw)) return {};
  const projects: Array<[string, RosterEntry[]]> = [];
  for (const [projectId, entries] of Object.entries(raw)) {
    if (!Array.isArray(entries)) continue;
    projects.push([
      projectId,
      entries
        .map(normalizeRosterEntry)
        .filter((entry): entry is RosterEntry => entry !== null),
    ]);
  }
  return Object.fromEntries(projects);
};

const normalizeRetry = (raw: unknown): RetryPolicy => {
  if (!isRecord(raw)) return defaultRetryPolicy;
  return {
    maxRetries: isNonNegative(raw.maxRetries)
      ? Math.floor(raw.maxRetries)
      : defaultRetryPolicy.maxRetries,
    initialDelayMs: isNonNegative(raw.initialDelayMs)
      ? raw.initialDelayMs
      : defaultRetryPolicy.initialDelayMs,
    exponentialBase: isNonNegative(raw.exponentialBase)
      ? raw.exponentialBase
      : defaultRetryPolicy.exponentialBase,
    retryableStatuses: isNumberArray(raw.retryableStatuses)
      ? raw.retryableStatuses
      : defaultRetryPolicy.retryableStatuses,
  };
};

const normalizeConfig = (parsed: unknown): OnboardingConfig => {
  if (!isRecord(parsed)) {
    return defaultOnboardingConfig;
  }

  return {
    serviceAccountId:
      typeof parsed.serviceAccountId === "string"
        ? parsed.serviceAccountId
        : defaultOnboardingConfig.serviceAccountId,
    defaultSpaces: isStringArray(parsed.defaultSpaces)
      ? parsed.defaultSpaces
      : defaultOnboardingConfig.defaultSpaces,
    roster: normalizeRoster(parsed.roster),
    retry: normalizeRetry(parsed.retry),
    logLevel: isLogLevelName(parsed.logLevel)
      ? parsed.logLevel
      : defaultOnboardingConfig.logLevel,
    stateDir:
      typeof parsed.stateDir === "string"
        ? parsed.stateDir
        : defaultOnboardingConfig.stateDir,
    protocolsDir:
      typeof parsed.protocolsDir === "string"
        ? parsed.protocolsDir
        : defaultOnboardingConfig.protocolsDir,
  };
};

const readConfigFile = async (cwd: string): Promise<unknown> => {
  const tsPath = path.join(cwd, ".onboarding", "config.ts");
  if (fs.existsSync(tsPath)) {
    logger.config.debug(`loading ${tsPath}`);
    return importModuleDefault(tsPath);
  }

  const jsonPath = path.join(cwd, ".onboarding", "config.json");
  if (!fs.existsSync(jsonPath)) {
    logger.config.debug(`no config under ${cwd}, using defaults`);
    return undefined;
  }
  logger.config.debug(`loading ${jsonPath}`);
  return JSON.parse(fs.readFileSync(jsonPath, "utf8")) as unknown;
};

/**
 * Load `.onboarding/config.ts` (or `.json`) under `cwd`, fill gaps from
 * defaults, then apply environment overrides.
 */
export const loadOnboardingConfig = async (
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<OnboardingConfig> => {
  const config = normalizeConfig(await readConfigFile(cwd));
  const envLevel = env.LOG_LEVEL?.toLowerCase();

  return {
    ...config,
    ...(env.ONBOARDING_SERVICE_ACCOUNT
      ? { serviceAccountId: env.ONBOARDING_SERVICE_ACCOUNT }
      : {}),
    ...(isLogLevelName(envLevel) ? { logLevel: envLevel } : {}),
  };
};
