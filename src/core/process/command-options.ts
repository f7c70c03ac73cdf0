// SPDX-License-Identifier: Apache-2.0

export interface CommandOptions {
  /** run the command through sudo, unless the current process is already root */
  readonly sudo?: boolean;
  /** resolve with the result instead of rejecting when the command exits with a nonzero status */
  readonly ignoreStatus?: boolean;
}
