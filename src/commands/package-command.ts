// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {type Argv} from 'yargs';
import {container, inject, injectable} from 'tsyringe-neo';
import {type SoftwareManagerLogger} from '../core/logging/software-manager-logger.js';
import {type PackageManager} from '../core/package-managers/package-manager.js';
import {type RepoOptions} from '../core/package-managers/repository/repo-config.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {SoftwareManagerError} from '../core/errors/software-manager-error.js';
import {StringEx} from '../business/utils/string-ex.js';

/**
 * Wires the package manager operations to yargs commands.
 */
@injectable()
export class PackageCommand {
  private readonly logger: SoftwareManagerLogger;

  public constructor(@inject(InjectTokens.Logger) logger?: SoftwareManagerLogger) {
    this.logger = patchInject(logger, InjectTokens.Logger, this.constructor.name);
  }

  /**
   * Converts `key=value` pairs to repository options, the value may itself contain `=`.
   */
  public static parseRepoOptions(pairs: readonly string[] = []): RepoOptions {
    const options: RepoOptions = {};
    for (const pair of pairs) {
      const separator: number = pair.indexOf('=');
      if (separator <= 0) {
        throw new SoftwareManagerError(`Invalid repository option '${pair}', expected key=value`);
      }
      options[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
    }
    return options;
  }

  public register<T>(argv: Argv<T>): Argv<T> {
    return argv
      .command(
        'install <name>',
        'Install a package',
        y => y.positional('name', {type: 'string', demandOption: true, describe: 'package name or local rpm file'}),
        async ({name}): Promise<void> => {
          this.report(await this.packageManager().install(name), `Installed ${name}`, `Failed to install ${name}`);
        },
      )
      .command(
        'remove <name>',
        'Remove a package',
        y => y.positional('name', {type: 'string', demandOption: true, describe: 'package name'}),
        async ({name}): Promise<void> => {
          this.report(await this.packageManager().remove(name), `Removed ${name}`, `Failed to remove ${name}`);
        },
      )
      .command(
        'upgrade [name]',
        'Upgrade every package, or only the packages matching the name',
        y => y.positional('name', {type: 'string', describe: 'wildcard spec of the packages to upgrade'}),
        async ({name}): Promise<void> => {
          const target: string = name ?? 'all packages';
          this.report(await this.packageManager().upgrade(name), `Upgraded ${target}`, `Failed to upgrade ${target}`);
        },
      )
      .command('repo', 'Manage the software manager repository file', y =>
        y
          .command(
            'add <url>',
            'Add a repository',
            z =>
              z.positional('url', {type: 'string', demandOption: true, describe: 'base url'}).option('option', {
                alias: 'o',
                type: 'string',
                array: true,
                describe: 'repository option as key=value, eg. priority=1',
              }),
            async ({url, option}): Promise<void> => {
              const options: RepoOptions = PackageCommand.parseRepoOptions(option);
              this.report(
                await this.packageManager().addRepo(url, options),
                `Added repository ${url}`,
                `Failed to add repository ${url}`,
              );
            },
          )
          .command(
            'remove <url>',
            'Remove every repository with the given base url',
            z => z.positional('url', {type: 'string', demandOption: true, describe: 'base url'}),
            async ({url}): Promise<void> => {
              this.report(
                await this.packageManager().removeRepo(url),
                `Removed repository ${url}`,
                `Failed to remove repository ${url}`,
              );
            },
          )
          .demandCommand(1, 'Select a repo command'),
      )
      .command(
        'provides <name>',
        'Show the package that provides a capability',
        y => y.positional('name', {type: 'string', demandOption: true, describe: 'capability name'}),
        async ({name}): Promise<void> => {
          const provider: string | undefined = await this.packageManager().provides(name);
          this.report(provider !== undefined, provider ?? StringEx.EMPTY, `No package provides ${name}`);
        },
      )
      .command(
        'build-dep <name>',
        'Install the build dependencies of a package',
        y => y.positional('name', {type: 'string', demandOption: true, describe: 'package name or spec file'}),
        async ({name}): Promise<void> => {
          this.report(
            await this.packageManager().buildDep(name),
            `Installed build dependencies of ${name}`,
            `Failed to install build dependencies of ${name}`,
          );
        },
      )
      .command(
        'source <name> <dest>',
        'Download a source package and prepare it for building',
        y =>
          y
            .positional('name', {type: 'string', demandOption: true, describe: 'package name'})
            .positional('dest', {type: 'string', demandOption: true, describe: 'destination directory'})
            .option('build-option', {type: 'string', describe: 'rpmbuild option, -bp by default'}),
        async ({name, dest, buildOption}): Promise<void> => {
          const sourceDirectory: string = await this.packageManager().getSource(name, dest, buildOption);
          this.report(!StringEx.isEmpty(sourceDirectory), sourceDirectory, `Failed to get the sources of ${name}`);
        },
      )
      .command(
        'installed <name>',
        'Check whether a package is installed',
        y =>
          y
            .positional('name', {type: 'string', demandOption: true, describe: 'package name'})
            .option('package-version', {type: 'string', describe: 'required version'})
            .option('arch', {type: 'string', describe: 'required architecture'}),
        async ({name, packageVersion, arch}): Promise<void> => {
          this.report(
            await this.packageManager().checkInstalled(name, packageVersion, arch),
            `${name} is installed`,
            `${name} is not installed`,
          );
        },
      )
      .command(
        'list [name]',
        'List the installed packages, or the files of one package',
        y => y.positional('name', {type: 'string', describe: 'package name'}),
        async ({name}): Promise<void> => {
          const manager: PackageManager = this.packageManager();
          if (name) {
            this.logger.showList(`Files of ${name}`, await manager.listFiles(name));
          } else {
            this.logger.showList('Installed packages', await manager.listAll());
          }
        },
      )
      .command(
        'clean',
        'Clean the package manager cache',
        y => y,
        async (): Promise<void> => {
          this.report(await this.packageManager().cleanCache(), 'Cache cleaned', 'Failed to clean the cache');
        },
      );
  }

  private packageManager(): PackageManager {
    return container.resolve<PackageManager>(InjectTokens.YumPackageManager);
  }

  private report(succeeded: boolean, success: string, failure: string): void {
    if (succeeded) {
      this.logger.showUser(chalk.green(success));
      return;
    }
    this.logger.showUser(chalk.red(failure));
    process.exitCode = 1;
  }
}
