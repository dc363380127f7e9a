import { ConfigError } from "../config.js";
import type { Io } from "../io/types.js";
import { SchemaIncompleteError } from "../schema/metadata.js";
import type { Logger } from "../util/logger.js";
import type { HealthCheck } from "./health-check.js";
import type { CheckMode, CheckResult } from "./types.js";

export type CheckReport = {
  name: string;
  result: CheckResult;
  skipped: boolean;
  error: string | null;
};

export type RunReport = {
  ok: boolean;
  mode: CheckMode;
  checks: CheckReport[];
};

export class HealthCheckRunner {
  private readonly checks: HealthCheck[];
  private readonly io: Io;
  private readonly logger: Logger;

  constructor(checks: HealthCheck[], io: Io, logger: Logger) {
    this.checks = checks;
    this.io = io;
    this.logger = logger;
  }

  names(): string[] {
    return this.checks.map((c) => c.name);
  }

  /**
   * Gives every check its turn, in registration order. An abort only ends the
   * check it happened in. A non-empty `resumeToken` skips the checks registered
   * before the named one.
   */
  async run(mode: CheckMode, resumeToken = ""): Promise<RunReport> {
    if (resumeToken !== "" && !this.names().includes(resumeToken)) {
      throw new ConfigError(`unknown check "${resumeToken}" (expected one of: ${this.names().join("|")})`);
    }

    let token = resumeToken;
    const reports: CheckReport[] = [];
    for (const check of this.checks) {
      const skipped = token !== "" && token !== check.name;
      let result: CheckResult;
      let error: string | null = null;
      try {
        result = await check.handle(mode, token);
      } catch (err) {
        if (!(err instanceof SchemaIncompleteError)) throw err;
        this.logger.warn({ check: check.name, table: err.table, role: err.role }, "schema incomplete, check aborted");
        this.io.warning([`Check "${check.name}" can not run:`, err.message]);
        result = "aborted";
        error = err.message;
      }
      if (token === check.name) token = "";
      reports.push({ name: check.name, result, skipped, error });
    }

    const ok = reports.every((r) => r.result === "ok");
    this.logger.info({ mode, ok, aborted: reports.filter((r) => r.result === "aborted").map((r) => r.name) }, "health check run finished");
    return { ok, mode, checks: reports };
  }
}
