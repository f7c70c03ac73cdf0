// SPDX-License-Identifier: Apache-2.0

export interface LogMeta {
  traceId?: string;
  [key: string]: unknown;
}

export interface SoftwareManagerLogger {
  setDevMode(developmentMode: boolean): void;

  nextTraceId(): void;

  prepMeta(meta?: LogMeta): LogMeta;

  /** prints the message to the console and records it in the log file */
  showUser(message: unknown, ...arguments_: unknown[]): void;

  showUserError(error: unknown): void;

  showList(title: string, items?: string[]): boolean;

  error(message: unknown, ...arguments_: unknown[]): void;

  warn(message: unknown, ...arguments_: unknown[]): void;

  info(message: unknown, ...arguments_: unknown[]): void;

  debug(message: unknown, ...arguments_: unknown[]): void;
}
