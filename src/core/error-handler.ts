// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type SoftwareManagerLogger} from './logging/software-manager-logger.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';

@injectable()
export class ErrorHandler {
  private readonly logger: SoftwareManagerLogger;

  public constructor(@inject(InjectTokens.Logger) logger?: SoftwareManagerLogger) {
    this.logger = patchInject(logger, InjectTokens.Logger, this.constructor.name);
  }

  /**
   * Shows the error to the user, records it in the log and marks the process as failed.
   */
  public handle(error: unknown): void {
    this.logger.showUserError(error);
    process.exitCode = 1;
  }
}
