/**
 * Outbound side of the reporter: the build client that receives notifications.
 */
import {
  PublishDiagnosticsNotification,
  TaskFinishNotification,
  TaskStartNotification,
  type PublishDiagnosticsParams,
  type TaskFinishParams,
  type TaskStartParams,
} from "@compile-reporter/protocol";
import { debug } from "./debug.js";
import { formatError, sendNotification, type Logger, type NotificationConnection } from "./logger.js";

/**
 * Receiver of compile notifications. Calls are fire-and-forget; delivery
 * problems are the client's to handle.
 */
export interface BuildClient {
  onBuildPublishDiagnostics(params: PublishDiagnosticsParams): void;
  onBuildTaskStart(params: TaskStartParams): void;
  onBuildTaskFinish(params: TaskFinishParams): void;
}

/**
 * Build client that sends each notification over a JSON-RPC connection.
 * Sends are not awaited; a failed send is logged and dropped.
 */
export function createConnectionBuildClient(connection: NotificationConnection, logger: Logger): BuildClient {
  function report(method: string) {
    return (e: unknown) => {
      logger.error(`${method} failed: ${formatError(e)}`);
    };
  }

  return {
    onBuildPublishDiagnostics(params) {
      debug.client("publishDiagnostics", { uri: params.textDocument.uri, count: params.diagnostics.length });
      sendNotification(connection, PublishDiagnosticsNotification, params).catch(
        report(PublishDiagnosticsNotification.method),
      );
    },
    onBuildTaskStart(params) {
      debug.client("taskStart", { taskId: params.taskId.id });
      sendNotification(connection, TaskStartNotification, params).catch(report(TaskStartNotification.method));
    },
    onBuildTaskFinish(params) {
      debug.client("taskFinish", { taskId: params.taskId.id, status: params.status });
      sendNotification(connection, TaskFinishNotification, params).catch(report(TaskFinishNotification.method));
    },
  };
}
