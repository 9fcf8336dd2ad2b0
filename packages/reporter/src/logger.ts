import { LogMessageNotification, MessageType } from "@compile-reporter/protocol";
import type { MessageConnection, NotificationType } from "vscode-languageserver/node.js";

export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const NOOP_LOGGER: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export type NotificationConnection = Pick<MessageConnection, "sendNotification">;

export function formatError(e: unknown): string {
  return e instanceof Error ? e.stack ?? e.message : String(e);
}

/**
 * Send a notification so that every failure arrives through the returned
 * promise. A closed or disposed connection throws before sending.
 */
export function sendNotification<P>(connection: NotificationConnection, type: NotificationType<P>, params: P): Promise<void> {
  try {
    return connection.sendNotification(type, params);
  } catch (e: unknown) {
    return Promise.reject(e);
  }
}

/**
 * Logger that forwards to the client as `build/logMessage`.
 * A message the transport refuses goes to stderr instead.
 */
export function createConnectionLogger(connection: NotificationConnection, prefix = "[compile-reporter]"): Logger {
  const send = (type: MessageType, m: string) => {
    const message = `${prefix} ${m}`;
    sendNotification(connection, LogMessageNotification, { type, message }).catch((e: unknown) => {
      process.stderr.write(`${message}\n(build/logMessage failed: ${formatError(e)})\n`);
    });
  };
  return {
    log: (m: string) => send(MessageType.Log, m),
    info: (m: string) => send(MessageType.Info, m),
    warn: (m: string) => send(MessageType.Warning, m),
    error: (m: string) => send(MessageType.Error, m),
  };
}
