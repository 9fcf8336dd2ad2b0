import { NotificationType } from "vscode-languageserver/node.js";
import type {
  LogMessageParams,
  PublishDiagnosticsParams,
  TaskFinishParams,
  TaskStartParams,
} from "./types.js";

// Server → client notifications sent while compiling a target.
export const PublishDiagnosticsNotification = new NotificationType<PublishDiagnosticsParams>("build/publishDiagnostics");
export const TaskStartNotification = new NotificationType<TaskStartParams>("build/taskStart");
export const TaskFinishNotification = new NotificationType<TaskFinishParams>("build/taskFinish");
export const LogMessageNotification = new NotificationType<LogMessageParams>("build/logMessage");
