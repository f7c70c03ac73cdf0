// SPDX-License-Identifier: Apache-2.0

import {type CommandOptions} from './command-options.js';
import {type CommandResult} from './command-result.js';

/**
 * Executes shell command lines.
 *
 * Implementations reject with a {@link CommandError} when the command exits with a nonzero status and
 * `ignoreStatus` is not set.
 */
export interface ProcessRunner {
  run(command: string, options?: CommandOptions): Promise<CommandResult>;

  /**
   * Resolves the absolute path of an executable available on the PATH.
   * @throws CommandNotFoundError if the executable cannot be found
   */
  findCommand(name: string): Promise<string>;
}
