import {
  StatusCode,
  TaskDataKind,
  type CompileReport,
  type CompileTask,
  type PublishDiagnosticsParams,
  type TaskFinishParams,
  type TaskStartParams,
  type TextDocumentIdentifier,
} from "@compile-reporter/protocol";
import { resolveReporterOptions, type ReporterOptions, type ResolvedReporterOptions } from "./config.js";
import { debug } from "./debug.js";
import { toDiagnostic } from "./mapping/diagnostic.js";
import { fileDocument, problemDocument } from "./mapping/document.js";
import type { CompileProblemReporter, Problem, ProblemSeverity } from "./problem.js";
import { ProblemCounters, type ProblemCounts } from "./services/counters.js";
import { DiagnosticStore, type DiagnosticSet } from "./services/diagnostic-store.js";
import { OnceFlag } from "./services/once-flag.js";

/**
 * Reporter for one compilation task of one build target.
 *
 * Every logged problem is published right away as `build/publishDiagnostics`,
 * carrying all diagnostics seen so far for its document with `reset: true`.
 * `start()` and `finish()` each send their task notification at most once,
 * however often they are called. Discard the instance once finished.
 */
export class CompileDiagnosticsReporter implements CompileProblemReporter {
  readonly compileTask: CompileTask;

  #options: ResolvedReporterOptions;
  #store = new DiagnosticStore();
  #counters = new ProblemCounters();
  #started = new OnceFlag();
  #finished = new OnceFlag();
  #startedAt: number | undefined;

  constructor(options: ReporterOptions) {
    this.#options = resolveReporterOptions(options);
    this.compileTask = { target: this.#options.target };
  }

  start(): void {
    const { client, logger, taskId, targetDisplayName } = this.#options;
    if (!this.#started.tryFire()) {
      logger.log(`[task] ${taskId.id} start ignored: already started`);
      return;
    }
    const eventTime = this.#options.now();
    this.#startedAt = eventTime;
    const params: TaskStartParams = {
      taskId,
      eventTime,
      message: `Compiling target ${targetDisplayName}`,
      dataKind: TaskDataKind.CompileTask,
      data: this.compileTask,
    };
    logger.info(`[task] ${taskId.id} started target=${targetDisplayName}`);
    client.onBuildTaskStart(params);
  }

  logError(problem: Problem): void {
    this.#report(problem, "error");
  }

  logWarning(problem: Problem): void {
    this.#report(problem, "warning");
  }

  logInfo(problem: Problem): void {
    this.#report(problem, "info");
  }

  /** Route a problem to the entry point matching its own severity. */
  logProblem(problem: Problem): void {
    switch (problem.severity) {
      case "error":
        this.logError(problem);
        return;
      case "warning":
        this.logWarning(problem);
        return;
      case "info":
        this.logInfo(problem);
        return;
    }
  }

  /**
   * Publish the current set for a compiled file, empty if it had no problems,
   * so clients can clear markers left from an earlier run.
   */
  fileVisited(file: string): void {
    const textDocument = fileDocument(file);
    this.#publish(textDocument, this.#store.ensure(textDocument));
  }

  printSummary(): void {
    this.finish();
  }

  finish(): void {
    const { client, logger, taskId, target, targetDisplayName, originId } = this.#options;
    if (!this.#finished.tryFire()) {
      logger.log(`[task] ${taskId.id} finish ignored: already finished`);
      return;
    }
    const eventTime = this.#options.now();
    const { errors, warnings } = this.#counters.snapshot();
    const startedAt = this.#startedAt;
    const report: CompileReport = {
      target,
      errors,
      warnings,
      ...(originId !== undefined && { originId }),
      ...(startedAt !== undefined && { time: eventTime - startedAt }),
    };
    const status = errors > 0 ? StatusCode.Error : StatusCode.Ok;
    const params: TaskFinishParams = {
      taskId,
      eventTime,
      status,
      message: `Compiled ${targetDisplayName}`,
      dataKind: TaskDataKind.CompileReport,
      data: report,
    };
    logger.info(`[task] ${taskId.id} finished target=${targetDisplayName} errors=${errors} warnings=${warnings}`);
    client.onBuildTaskFinish(params);
  }

  /** Diagnostics published so far for a document URI. */
  diagnostics(uri: string): DiagnosticSet {
    return this.#store.get(uri) ?? [];
  }

  /** URIs of every document a publish has been sent for. */
  documents(): string[] {
    return this.#store.documents();
  }

  get counts(): ProblemCounts {
    return this.#counters.snapshot();
  }

  #report(problem: Problem, counted: ProblemSeverity): void {
    const diagnostic = toDiagnostic(problem);
    const textDocument = problemDocument(problem.position, this.#options.target);
    const diagnostics = this.#store.append(textDocument, diagnostic);
    debug.reporter("problem", { counted, uri: textDocument.uri, total: diagnostics.length });
    this.#publish(textDocument, diagnostics);
    this.#counters.increment(counted);
  }

  #publish(textDocument: TextDocumentIdentifier, diagnostics: DiagnosticSet): void {
    const { client, target, originId } = this.#options;
    const params: PublishDiagnosticsParams = {
      textDocument,
      buildTarget: target,
      diagnostics,
      reset: true,
      ...(originId !== undefined && { originId }),
    };
    client.onBuildPublishDiagnostics(params);
  }
}
