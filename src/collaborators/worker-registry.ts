import { minimatch } from "minimatch";
import type { ProvisioningWorker } from "./contracts";

interface Registration {
  pattern: string;
  worker: ProvisioningWorker;
}

/**
 * Maps step kinds to workers. Patterns are globs (`chat-*`); the first
 * registration that matches a kind wins.
 */
export class WorkerRegistry {
  private readonly registrations: Registration[] = [];

  register(pattern: string, worker: ProvisioningWorker): this {
    this.registrations.push({ pattern, worker });
    return this;
  }

  resolve(kind: string): ProvisioningWorker | undefined {
    return this.registrations.find((entry) => minimatch(kind, entry.pattern))
      ?.worker;
  }

  patterns(): string[] {
    return this.registrations.map((entry) => entry.pattern);
  }
}
