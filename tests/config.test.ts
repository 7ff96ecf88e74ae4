import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { defaultRetryPolicy } from "../src/collaborators/retry";
import { RosterAssignmentChecker } from "../src/collaborators/roster-assignment-checker";
import {
  asEmployeeId,
  asMissionId,
  asProjectId,
  asTraceId,
} from "../src/core/types";
import {
  defaultOnboardingConfig,
  loadOnboardingConfig,
} from "../src/project/config";

const tempProject = () =>
  fs.mkdtempSync(path.join(os.tmpdir(), "onboarding-config-"));

const writeConfig = (cwd: string, file: string, contents: string) => {
  const target = path.join(cwd, ".onboarding", file);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, contents);
};

describe("onboarding config", () => {
  it("returns defaults when no config file exists", async () => {
    expect(await loadOnboardingConfig(tempProject(), {})).toEqual(
      defaultOnboardingConfig,
    );
  });

  it("loads and normalizes .onboarding/config.json", async () => {
    const cwd = tempProject();
    writeConfig(
      cwd,
      "config.json",
      JSON.stringify({
        serviceAccountId: "svc-onboarding",
        defaultSpaces: ["spaces/ANNOUNCEMENTS"],
        logLevel: "debug",
        retry: { maxRetries: 2.7, initialDelayMs: -5, retryableStatuses: [503] },
        roster: {
          "PROJ-ALPHA": [
            { email: "maria.rosa@enterprise.com", role: "Contributor" },
            { email: "x@enterprise.com", role: "Lead", status: "Inactive" },
            { nope: true },
          ],
          "PROJ-BROKEN": "not a list",
        },
      }),
    );

    const config = await loadOnboardingConfig(cwd, {});
    expect(config.serviceAccountId).toBe("svc-onboarding");
    expect(config.defaultSpaces).toEqual(["spaces/ANNOUNCEMENTS"]);
    expect(config.logLevel).toBe("debug");
    expect(config.retry).toEqual({
      maxRetries: 2,
      initialDelayMs: defaultRetryPolicy.initialDelayMs,
      exponentialBase: defaultRetryPolicy.exponentialBase,
      retryableStatuses: [503],
    });
    expect(config.roster).toEqual({
      "PROJ-ALPHA": [
        {
          email: "maria.rosa@enterprise.com",
          role: "Contributor",
          status: "Active",
        },
        { email: "x@enterprise.com", role: "Lead", status: "Inactive" },
      ],
    });
    expect(config.stateDir).toBe(".onboarding/state");
  });

  it("keeps a __proto__ project id as ordinary roster data", async () => {
    const cwd = tempProject();
    writeConfig(
      cwd,
      "config.json",
      '{"roster":{"__proto__":[{"email":"a@enterprise.com","role":"Lead"}]}}',
    );

    const { roster } = await loadOnboardingConfig(cwd, {});
    expect(Object.getPrototypeOf(roster)).toBe(Object.prototype);
    expect(Object.hasOwn(roster, "__proto__")).toBe(true);

    const checker = new RosterAssignmentChecker(roster);
    expect(
      await checker.checkAssignment(
        asEmployeeId("a@enterprise.com"),
        asProjectId("__proto__"),
        { traceId: asTraceId("trace-config"), missionId: asMissionId("m-1") },
      ),
    ).toEqual({ authorized: true, role: "Lead" });
  });

  it("prefers .onboarding/config.ts when present", async () => {
    const cwd = tempProject();
    writeConfig(cwd, "config.json", JSON.stringify({ serviceAccountId: "json" }));
    writeConfig(
      cwd,
      "config.ts",
      `const account: string = "from-ts";
      export default { serviceAccountId: account, stateDir: "var/state" };`,
    );

    const config = await loadOnboardingConfig(cwd, {});
    expect(config.serviceAccountId).toBe("from-ts");
    expect(config.stateDir).toBe("var/state");
  });

  it("applies environment overrides last", async () => {
    const cwd = tempProject();
    writeConfig(
      cwd,
      "config.json",
      JSON.stringify({ serviceAccountId: "file", logLevel: "info" }),
    );

    const config = await loadOnboardingConfig(cwd, {
      ONBOARDING_SERVICE_ACCOUNT: "env-account",
      LOG_LEVEL: "ERROR",
    });
    expect(config.serviceAccountId).toBe("env-account");
    expect(config.logLevel).toBe("error");
  });

  it("ignores unknown log levels", async () => {
    const config = await loadOnboardingConfig(tempProject(), {
      LOG_LEVEL: "loud",
    });
    expect(config.logLevel).toBe("warn");
  });
});
