// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs/promises';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {type RpmCapabilities} from './rpm-capabilities.js';
import {type ProcessRunner} from '../process/process-runner.js';
import {type CommandResult} from '../process/command-result.js';
import {type SoftwareManagerLogger} from '../logging/software-manager-logger.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {CommandError} from '../errors/command-error.js';
import {isErrnoException} from '../errors/io-error.js';
import {StringEx} from '../../business/utils/string-ex.js';
import * as constants from '../constants.js';

@injectable()
export class RpmPackageManager implements RpmCapabilities {
  private readonly runner: ProcessRunner;
  private readonly logger: SoftwareManagerLogger;

  public constructor(
    @inject(InjectTokens.ProcessRunner) runner?: ProcessRunner,
    @inject(InjectTokens.Logger) logger?: SoftwareManagerLogger,
  ) {
    this.runner = patchInject(runner, InjectTokens.ProcessRunner, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.Logger, this.constructor.name);
  }

  public async checkInstalled(name: string, version?: string, arch?: string): Promise<boolean> {
    let query: string = name;
    if (version) {
      query += `-${version}`;
    }
    if (arch) {
      query += `.${arch}`;
    }

    const result: CommandResult = await this.runner.run(`${constants.RPM} -q ${StringEx.shellQuote(query)}`, {
      ignoreStatus: true,
    });
    return result.exitCode === 0;
  }

  public async rpmInstall(filePath: string): Promise<boolean> {
    if (!(await this.isFile(filePath))) {
      this.logger.error(`Package file '${filePath}' does not exist`);
      return false;
    }

    try {
      await this.runner.run(`${constants.RPM} -i ${StringEx.shellQuote(filePath)}`, {sudo: true});
      return true;
    } catch (error) {
      if (error instanceof CommandError) {
        this.logger.error(error.message);
        return false;
      }
      throw error;
    }
  }

  public async prepareSource(specFile: string, destPath: string | undefined, buildOption?: string): Promise<string> {
    if (!(await this.isFile(specFile))) {
      this.logger.error('Please provide valid spec file');
      return StringEx.EMPTY;
    }
    if (destPath === undefined || StringEx.isEmpty(destPath)) {
      this.logger.error('Please provide valid dest_path');
      return StringEx.EMPTY;
    }

    const option: string = buildOption || constants.DEFAULT_BUILD_OPTION;
    try {
      await this.runner.run(
        StringEx.joinArguments(
          constants.RPMBUILD,
          StringEx.shellQuote(option),
          '--define',
          StringEx.shellQuote(`_builddir ${destPath}`),
          StringEx.shellQuote(specFile),
        ),
      );
      const entries: string[] = (await fs.readdir(destPath)).sort();
      if (entries.length === 0) {
        this.logger.error(`No sources were prepared in ${destPath}`);
        return StringEx.EMPTY;
      }
      return path.join(destPath, entries[0]);
    } catch (error) {
      if (error instanceof CommandError || isErrnoException(error)) {
        this.logger.error(error.message);
        return StringEx.EMPTY;
      }
      throw error;
    }
  }

  public async listAll(): Promise<string[]> {
    return this.query(`${constants.RPM} -qa`);
  }

  public async listFiles(name: string): Promise<string[]> {
    return this.query(`${constants.RPM} -ql ${StringEx.shellQuote(name)}`);
  }

  private async query(command: string): Promise<string[]> {
    try {
      const result: CommandResult = await this.runner.run(command);
      return StringEx.lines(result.stdout);
    } catch (error) {
      if (error instanceof CommandError) {
        this.logger.error(error.message);
        return [];
      }
      throw error;
    }
  }

  private async isFile(filePath: string): Promise<boolean> {
    try {
      return (await fs.stat(filePath)).isFile();
    } catch (error) {
      if (isErrnoException(error)) {
        return false;
      }
      throw error;
    }
  }
}
