// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs/promises';
import {type Dirent} from 'node:fs';
import path from 'node:path';
import {coerce, lt, valid} from 'semver';
import {inject, injectable} from 'tsyringe-neo';
import {type PackageManager} from './package-manager.js';
import {type RpmCapabilities} from './rpm-capabilities.js';
import {RepoConfig, type RepoOptions} from './repository/repo-config.js';
import {type PackageQueryHandle, type PackageQueryHandleFactory} from './query/package-query-handle.js';
import {type ProcessRunner} from '../process/process-runner.js';
import {type CommandResult} from '../process/command-result.js';
import {type SoftwareManagerLogger} from '../logging/software-manager-logger.js';
import {type RandomStringGenerator} from '../../business/utils/random-string.js';
import {StringEx} from '../../business/utils/string-ex.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {CommandError} from '../errors/command-error.js';
import {isErrnoException} from '../errors/io-error.js';
import * as constants from '../constants.js';

interface YumSession {
  /** absolute path of the package manager followed by `-y` */
  readonly baseCommand: string;
  readonly version: string;
  /** `--transient` on image mode hosts, empty otherwise */
  readonly transientOptions: string;
}

/**
 * Software manager backend for yum and the package managers that accept its command line, such as dnf.
 *
 * Commonly found on Red Hat based distributions, such as Fedora, CentOS Stream and Red Hat Enterprise Linux.
 * The tool is located and its version detected on first use.
 */
@injectable()
export class YumPackageManager implements PackageManager {
  private readonly runner: ProcessRunner;
  private readonly logger: SoftwareManagerLogger;
  private readonly rpm: RpmCapabilities;
  private readonly randomStrings: RandomStringGenerator;
  private readonly queryHandleFactory: PackageQueryHandleFactory;
  private readonly command: string;
  private readonly repoFilePath: string;
  private readonly rpmBuildDirectory: string;
  private readonly imageModeMarkerPath: string;
  private readonly tempDirectory: string;

  private session?: Promise<YumSession>;
  private repoConfig?: Promise<RepoConfig>;
  private queryHandle?: Promise<PackageQueryHandle | undefined>;
  private repoUpdates: Promise<void> = Promise.resolve();

  public constructor(
    @inject(InjectTokens.ProcessRunner) runner?: ProcessRunner,
    @inject(InjectTokens.Logger) logger?: SoftwareManagerLogger,
    @inject(InjectTokens.RpmPackageManager) rpm?: RpmCapabilities,
    @inject(InjectTokens.RandomStringGenerator) randomStrings?: RandomStringGenerator,
    @inject(InjectTokens.PackageQueryHandleFactory) queryHandleFactory?: PackageQueryHandleFactory,
    @inject(InjectTokens.PackageManagerCommand) command?: string,
    @inject(InjectTokens.RepoFilePath) repoFilePath?: string,
    @inject(InjectTokens.RpmBuildDirectory) rpmBuildDirectory?: string,
    @inject(InjectTokens.ImageModeMarkerPath) imageModeMarkerPath?: string,
    @inject(InjectTokens.TempDirectory) tempDirectory?: string,
  ) {
    this.runner = patchInject(runner, InjectTokens.ProcessRunner, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.Logger, this.constructor.name);
    this.rpm = patchInject(rpm, InjectTokens.RpmPackageManager, this.constructor.name);
    this.randomStrings = patchInject(randomStrings, InjectTokens.RandomStringGenerator, this.constructor.name);
    this.queryHandleFactory = patchInject(
      queryHandleFactory,
      InjectTokens.PackageQueryHandleFactory,
      this.constructor.name,
    );
    this.command = patchInject(command, InjectTokens.PackageManagerCommand, this.constructor.name);
    this.repoFilePath = patchInject(repoFilePath, InjectTokens.RepoFilePath, this.constructor.name);
    this.rpmBuildDirectory = patchInject(rpmBuildDirectory, InjectTokens.RpmBuildDirectory, this.constructor.name);
    this.imageModeMarkerPath = patchInject(
      imageModeMarkerPath,
      InjectTokens.ImageModeMarkerPath,
      this.constructor.name,
    );
    this.tempDirectory = patchInject(tempDirectory, InjectTokens.TempDirectory, this.constructor.name);
  }

  public async getVersion(): Promise<string> {
    return (await this.getSession()).version;
  }

  /**
   * Installs package [name]. Handles local installs.
   */
  public async install(name: string): Promise<boolean> {
    const session: YumSession = await this.getSession();
    return this.runCommand(
      StringEx.joinArguments(session.baseCommand, 'install', YumPackageManager.argument(name), session.transientOptions),
    );
  }

  /**
   * Removes package [name].
   * @param name - package name (eg. 'vim')
   */
  public async remove(name: string): Promise<boolean> {
    const session: YumSession = await this.getSession();
    return this.runCommand(
      StringEx.joinArguments(session.baseCommand, 'erase', YumPackageManager.argument(name), session.transientOptions),
    );
  }

  /**
   * Upgrade all available packages, or only the ones matching [name].
   * @param name - optional wildcard spec of the packages to upgrade
   */
  public async upgrade(name?: string): Promise<boolean> {
    const session: YumSession = await this.getSession();
    return this.runCommand(
      StringEx.joinArguments(session.baseCommand, 'update', YumPackageManager.argument(name), session.transientOptions),
    );
  }

  /**
   * Adds the package repository located on [url] to the managed repository file.
   *
   * Nothing is written when a repository with the same base url is already present.
   *
   * @param url - base url of the repository
   * @param options - extra repository options, eg. {priority: '1'}; they take precedence over the defaults
   */
  public async addRepo(url: string, options: RepoOptions = {}): Promise<boolean> {
    return this.updateRepoConfig(async (config: RepoConfig): Promise<boolean> => {
      if (config.findByBaseUrl(url).length > 0) {
        return true;
      }

      let sectionName: string;
      do {
        sectionName =
          constants.REPO_SECTION_PREFIX + this.randomStrings.generate(constants.REPO_SECTION_SUFFIX_LENGTH);
      } while (config.hasSection(sectionName));

      config.addSection(sectionName, {
        name: constants.REPO_DISPLAY_NAME,
        baseurl: url,
        ...constants.DEFAULT_REPO_OPTIONS,
        ...options,
      });
      try {
        await this.writeRepoConfig(config);
        return true;
      } catch (error) {
        config.removeSection(sectionName);
        return this.handleRepoError(error);
      }
    });
  }

  /**
   * Removes every repository located on [url] from the managed repository file.
   */
  public async removeRepo(url: string): Promise<boolean> {
    return this.updateRepoConfig(async (config: RepoConfig): Promise<boolean> => {
      const removed: string[] = config.removeByBaseUrl(url);
      this.logger.debug(`Removing repository sections [${removed.join(', ')}] for ${url}`);
      try {
        await this.writeRepoConfig(config);
        return true;
      } catch (error) {
        return this.handleRepoError(error);
      }
    });
  }

  /**
   * Returns the first package that provides the given capability.
   * @param name - capability name (eg, 'foo')
   */
  public async provides(name: string): Promise<string | undefined> {
    this.queryHandle ??= this.queryHandleFactory.create();
    const handle: PackageQueryHandle | undefined = await this.queryHandle;
    if (!handle) {
      this.logger.error(
        `The method 'provides' is disabled, a package database query tool for ${this.command} is required for this operation`,
      );
      return undefined;
    }

    let matches: string[];
    try {
      // globs are needed to find every file path ending with the capability name
      matches = await handle.searchPackageProvides([`*/${name}`]);
    } catch (error) {
      this.logger.error(`Error searching for package that provides ${name}: ${YumPackageManager.messageOf(error)}`);
      matches = [];
    }

    return matches.length > 0 ? matches[0] : undefined;
  }

  /**
   * Installs the build dependencies of package [name], a spec file path is accepted as well.
   */
  public async buildDep(name: string): Promise<boolean> {
    return this.runCommand(
      StringEx.joinArguments(constants.YUM_BUILDDEP, '-y', '--tolerant', YumPackageManager.argument(name)),
    );
  }

  /**
   * Downloads the source package and prepares it in the given destination to be ready to build.
   *
   * @param name - name of the package
   * @param destPath - destination directory of the prepared sources
   * @param buildOption - rpmbuild option, `-bp` by default
   * @returns the path of the ready-to-build directory, or an empty string on failure
   */
  public async getSource(name: string, destPath: string | undefined, buildOption?: string): Promise<string> {
    const downloadDirectory: string = await fs.mkdtemp(path.join(this.tempDirectory, constants.TEMP_FILE_PREFIX));
    try {
      if (destPath === undefined || StringEx.isEmpty(destPath)) {
        this.logger.error('Please provide a valid path');
        return StringEx.EMPTY;
      }

      for (const helper of constants.SOURCE_PACKAGE_HELPERS) {
        if (!(await this.rpm.checkInstalled(helper)) && !(await this.install(helper))) {
          this.logger.error(
            `SoftwareManager (YumPackageManager) can't get packages with dependency resolution: Package '${helper}' could not be installed`,
          );
          return StringEx.EMPTY;
        }
      }

      try {
        await this.runner.run(
          StringEx.joinArguments(
            constants.YUMDOWNLOADER,
            '--assumeyes',
            '--verbose',
            '--source',
            StringEx.shellQuote(name),
            '--destdir',
            StringEx.shellQuote(downloadDirectory),
          ),
        );

        const entries: Dirent[] = await fs.readdir(downloadDirectory, {withFileTypes: true});
        const sourcePackages: string[] = entries
          .filter((entry: Dirent): boolean => entry.isFile() && entry.name.endsWith(constants.SOURCE_PACKAGE_EXTENSION))
          .map((entry: Dirent): string => entry.name);

        if (sourcePackages.length !== 1) {
          this.logger.error(
            `Failed to get downloaded src.rpm from ${downloadDirectory}:\n${entries
              .map((entry: Dirent): string => entry.name)
              .sort()
              .join('\n')}`,
          );
        } else if (await this.rpm.rpmInstall(path.join(downloadDirectory, sourcePackages[0]))) {
          const specPath: string = path.join(this.rpmBuildDirectory, 'SPECS', `${name}.spec`);
          if (await this.buildDep(specPath)) {
            return await this.rpm.prepareSource(specPath, destPath, buildOption);
          }
          this.logger.error('Installing build dependencies failed');
        } else {
          this.logger.error('Installing source rpm failed');
        }
      } catch (error) {
        if (error instanceof CommandError || isErrnoException(error)) {
          this.logger.error(error.message);
        } else {
          throw error;
        }
      }
      return StringEx.EMPTY;
    } finally {
      await fs.rm(downloadDirectory, {recursive: true, force: true});
    }
  }

  public async checkInstalled(name: string, version?: string, arch?: string): Promise<boolean> {
    return this.rpm.checkInstalled(name, version, arch);
  }

  public async listAll(): Promise<string[]> {
    return this.rpm.listAll();
  }

  public async listFiles(name: string): Promise<string[]> {
    return this.rpm.listFiles(name);
  }

  /**
   * Clean up the package manager cache so new package information can be downloaded.
   */
  public async cleanCache(): Promise<boolean> {
    return this.runCommand(StringEx.joinArguments(StringEx.shellQuote(this.command), 'clean', 'all'));
  }

  private async getSession(): Promise<YumSession> {
    this.session ??= this.createSession();
    return this.session;
  }

  private async createSession(): Promise<YumSession> {
    const baseCommand: string = `${StringEx.shellQuote(await this.runner.findCommand(this.command))} -y`;

    const result: CommandResult = await this.runner.run(`${baseCommand} --version`, {ignoreStatus: true});
    const firstLine: string = result.stdout.split(/\r?\n/)[0]?.trim() ?? StringEx.EMPTY;
    const version: string = coerce(firstLine)?.version ?? firstLine;
    this.logger.debug(`${this.command} version: ${version}`);
    if (valid(version) && lt(version, constants.MINIMUM_YUM_VERSION)) {
      this.logger.warn(
        `${this.command} ${version} is older than ${constants.MINIMUM_YUM_VERSION}, some operations may not be supported`,
      );
    }

    const transientOptions: string = (await this.isDirectory(this.imageModeMarkerPath))
      ? constants.TRANSIENT_FLAG
      : StringEx.EMPTY;

    return {baseCommand, version, transientOptions};
  }

  /**
   * Runs repository file updates one at a time, so each one starts from the document the previous one left.
   */
  private async updateRepoConfig(update: (config: RepoConfig) => Promise<boolean>): Promise<boolean> {
    const result: Promise<boolean> = this.repoUpdates.then(
      async (): Promise<boolean> => update(await this.getRepoConfig()),
    );
    // the caller observes a failure through its own promise, the queue only waits for completion
    this.repoUpdates = result.then(
      (): void => undefined,
      (): void => undefined,
    );
    return result;
  }

  private async getRepoConfig(): Promise<RepoConfig> {
    this.repoConfig ??= this.readRepoConfig();
    return this.repoConfig;
  }

  private async readRepoConfig(): Promise<RepoConfig> {
    try {
      return RepoConfig.parse(await fs.readFile(this.repoFilePath, 'utf8'));
    } catch (error) {
      if (!isErrnoException(error)) {
        throw error;
      }
      this.logger.debug(`Unable to read ${this.repoFilePath} (${error.code}), starting with an empty repository file`);
      return RepoConfig.empty();
    }
  }

  /**
   * Writes the document to a temporary file and copies it over the repository file with elevated privileges.
   */
  private async writeRepoConfig(config: RepoConfig): Promise<void> {
    const directory: string = await fs.mkdtemp(path.join(this.tempDirectory, constants.TEMP_FILE_PREFIX));
    try {
      const temporaryFile: string = path.join(directory, path.basename(this.repoFilePath));
      await fs.writeFile(temporaryFile, config.render(), 'utf8');
      await this.runner.run(
        StringEx.joinArguments('cp', StringEx.shellQuote(temporaryFile), StringEx.shellQuote(this.repoFilePath)),
        {sudo: true},
      );
    } finally {
      await fs.rm(directory, {recursive: true, force: true});
    }
  }

  private handleRepoError(error: unknown): boolean {
    if (error instanceof CommandError || isErrnoException(error)) {
      this.logger.error(error.message);
      return false;
    }
    throw error;
  }

  private async runCommand(command: string): Promise<boolean> {
    try {
      await this.runner.run(command, {sudo: true});
      return true;
    } catch (error) {
      if (error instanceof CommandError) {
        this.logger.error(error.message);
        return false;
      }
      throw error;
    }
  }

  private async isDirectory(directoryPath: string): Promise<boolean> {
    try {
      return (await fs.stat(directoryPath)).isDirectory();
    } catch (error) {
      if (isErrnoException(error)) {
        return false;
      }
      throw error;
    }
  }

  /** Quotes a caller supplied argument, an empty or missing one is left out of the command line */
  private static argument(value: string | undefined): string | undefined {
    return value === undefined || StringEx.isEmpty(value) ? undefined : StringEx.shellQuote(value);
  }

  private static messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
