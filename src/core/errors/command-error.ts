// SPDX-License-Identifier: Apache-2.0

import {SoftwareManagerError} from './software-manager-error.js';
import {type CommandResult} from '../process/command-result.js';

/**
 * Raised by a process runner when a command exits with a nonzero status.
 */
export class CommandError extends SoftwareManagerError {
  public constructor(
    public readonly result: CommandResult,
    cause?: unknown,
  ) {
    super(
      `Command exit with error code ${result.exitCode}, [command: '${result.command}'], [message: '${result.stderr}']`,
      cause,
      {commandExitCode: result.exitCode},
    );
  }

  public get exitCode(): number {
    return this.result.exitCode;
  }
}
