import type { BuildTargetIdentifier, TaskId } from "@compile-reporter/protocol";
import type { BuildClient } from "./client.js";
import { NOOP_LOGGER, type Logger } from "./logger.js";

export interface ReporterOptions {
  readonly client: BuildClient;
  readonly target: BuildTargetIdentifier;
  /** Human-readable target name used in task messages. */
  readonly targetDisplayName: string;
  readonly taskId: TaskId;
  /** Client-assigned id of the compile request, echoed on diagnostics and the report. */
  readonly originId?: string;
  readonly logger?: Logger;
  /** Clock for `eventTime`, in epoch milliseconds. */
  readonly now?: () => number;
}

export interface ResolvedReporterOptions {
  readonly client: BuildClient;
  readonly target: BuildTargetIdentifier;
  readonly targetDisplayName: string;
  readonly taskId: TaskId;
  readonly originId: string | undefined;
  readonly logger: Logger;
  readonly now: () => number;
}

export class ReporterConfigError extends Error {
  constructor(
    message: string,
    public readonly field: keyof ReporterOptions,
  ) {
    super(message);
    this.name = "ReporterConfigError";
  }
}

export function resolveReporterOptions(options: ReporterOptions): ResolvedReporterOptions {
  if (!options.target.uri) {
    throw new ReporterConfigError("Build target URI must not be empty", "target");
  }
  if (!options.taskId.id) {
    throw new ReporterConfigError("Task id must not be empty", "taskId");
  }
  return {
    client: options.client,
    target: options.target,
    targetDisplayName: options.targetDisplayName,
    taskId: options.taskId,
    originId: options.originId,
    logger: options.logger ?? NOOP_LOGGER,
    now: options.now ?? Date.now,
  };
}
