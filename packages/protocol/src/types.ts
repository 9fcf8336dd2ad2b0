/**
 * Build Server Protocol records used by compile reporting.
 *
 * Diagnostics, ranges and document identifiers share their shape with LSP, so
 * those come straight from vscode-languageserver. Everything else here is the
 * BSP-specific envelope: build targets, tasks, compile reports.
 */
import type { Diagnostic, MessageType, TextDocumentIdentifier } from "vscode-languageserver/node.js";

// =============================================================================
// Identifiers
// =============================================================================

/** A compilable unit (module, project) identified by URI. */
export interface BuildTargetIdentifier {
  readonly uri: string;
}

/** Correlates the start, progress and finish notifications of one task. */
export interface TaskId {
  readonly id: string;
  readonly parents?: readonly string[];
}

export function createTaskId(id: string, parents?: readonly string[]): TaskId {
  return parents?.length ? { id, parents } : { id };
}

// =============================================================================
// Enums
// =============================================================================

export const StatusCode = {
  Ok: 1,
  Error: 2,
  Cancelled: 3,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

export const TaskDataKind = {
  CompileTask: "compile-task",
  CompileReport: "compile-report",
} as const;

export type TaskDataKind = (typeof TaskDataKind)[keyof typeof TaskDataKind];

// =============================================================================
// Task payloads
// =============================================================================

export interface CompileTask {
  readonly target: BuildTargetIdentifier;
}

export interface CompileReport {
  readonly target: BuildTargetIdentifier;
  readonly errors: number;
  readonly warnings: number;
  readonly originId?: string;
  /** Milliseconds between the task's start and finish notifications. */
  readonly time?: number;
}

// =============================================================================
// Notification params
// =============================================================================

export interface PublishDiagnosticsParams {
  readonly textDocument: TextDocumentIdentifier;
  readonly buildTarget: BuildTargetIdentifier;
  readonly diagnostics: readonly Diagnostic[];
  /** Always true here: the payload replaces whatever the client holds for the document. */
  readonly reset: boolean;
  readonly originId?: string;
}

export interface LogMessageParams {
  readonly type: MessageType;
  readonly message: string;
  readonly task?: TaskId;
  readonly originId?: string;
}

export interface TaskStartParams {
  readonly taskId: TaskId;
  readonly eventTime: number;
  readonly message: string;
  readonly dataKind: typeof TaskDataKind.CompileTask;
  readonly data: CompileTask;
}

export interface TaskFinishParams {
  readonly taskId: TaskId;
  readonly eventTime: number;
  readonly status: StatusCode;
  readonly message: string;
  readonly dataKind: typeof TaskDataKind.CompileReport;
  readonly data: CompileReport;
}
