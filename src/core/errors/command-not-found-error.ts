// SPDX-License-Identifier: Apache-2.0

import {SoftwareManagerError} from './software-manager-error.js';

export class CommandNotFoundError extends SoftwareManagerError {
  public constructor(
    public readonly commandName: string,
    cause?: unknown,
  ) {
    super(`Command '${commandName}' could not be found in the system PATH`, cause, {commandName});
  }
}
