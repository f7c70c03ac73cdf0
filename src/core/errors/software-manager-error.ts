// SPDX-License-Identifier: Apache-2.0

export class SoftwareManagerError extends Error {
  /**
   * Create a custom error object
   *
   * the stack of the `cause` is appended to this error's stack
   *
   * @param message error message
   * @param cause source error (if any)
   * @param meta additional metadata (if any)
   */
  public constructor(
    message: string,
    public override readonly cause?: unknown,
    public readonly meta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
    if (cause instanceof Error) {
      this.stack = `${this.stack ?? message}\nCaused by: ${cause.stack}`;
    }
  }
}
