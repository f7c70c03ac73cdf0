// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type PackageQueryHandle, type PackageQueryHandleFactory} from './package-query-handle.js';
import {type ProcessRunner} from '../../process/process-runner.js';
import {type CommandResult} from '../../process/command-result.js';
import {type SoftwareManagerLogger} from '../../logging/software-manager-logger.js';
import {InjectTokens} from '../../dependency-injection/inject-tokens.js';
import {patchInject} from '../../dependency-injection/container-helper.js';
import {CommandNotFoundError} from '../../errors/command-not-found-error.js';
import * as constants from '../../constants.js';
import {StringEx} from '../../../business/utils/string-ex.js';

/**
 * Queries the package database through the `repoquery` tool from yum-utils/dnf-plugins-core.
 */
export class RepoqueryHandle implements PackageQueryHandle {
  public constructor(
    private readonly runner: ProcessRunner,
    private readonly executable: string,
  ) {}

  public async searchPackageProvides(patterns: string[]): Promise<string[]> {
    const quoted: string[] = patterns.map((pattern: string): string => StringEx.shellQuote(pattern));
    const result: CommandResult = await this.runner.run(
      StringEx.joinArguments(this.executable, '--quiet', '--whatprovides', ...quoted),
    );
    return StringEx.lines(result.stdout);
  }
}

@injectable()
export class RepoqueryHandleFactory implements PackageQueryHandleFactory {
  private readonly runner: ProcessRunner;
  private readonly logger: SoftwareManagerLogger;

  public constructor(
    @inject(InjectTokens.ProcessRunner) runner?: ProcessRunner,
    @inject(InjectTokens.Logger) logger?: SoftwareManagerLogger,
  ) {
    this.runner = patchInject(runner, InjectTokens.ProcessRunner, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.Logger, this.constructor.name);
  }

  public async create(): Promise<PackageQueryHandle | undefined> {
    try {
      return new RepoqueryHandle(this.runner, await this.runner.findCommand(constants.REPOQUERY));
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        this.logger.debug(`${constants.REPOQUERY} is not available, package database queries are disabled`);
        return undefined;
      }
      throw error;
    }
  }
}
