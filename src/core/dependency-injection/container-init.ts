// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {type SoftwareManagerLogger} from '../logging/software-manager-logger.js';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {SingletonContainer} from './singleton-container.js';
import {ValueContainer} from './value-container.js';
import {WinstonLogger} from '../logging/winston-logger.js';
import {ShellRunner} from '../shell-runner.js';
import {ErrorHandler} from '../error-handler.js';
import {AlphanumericStringGenerator} from '../../business/utils/random-string.js';
import {RpmPackageManager} from '../package-managers/rpm-package-manager.js';
import {RepoqueryHandleFactory} from '../package-managers/query/repoquery-handle.js';
import {YumPackageManager} from '../package-managers/yum-package-manager.js';
import {PackageCommand} from '../../commands/package-command.js';

export type InstanceOverrides = Map<symbol, SingletonContainer | ValueContainer>;

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logLevel - the log level to use, defaults to constants.SOFTWARE_MANAGER_LOG_LEVEL
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   */
  public init(
    logLevel: string = constants.SOFTWARE_MANAGER_LOG_LEVEL,
    developmentMode: boolean = false,
    overrides: InstanceOverrides = new Map<symbol, SingletonContainer | ValueContainer>(),
  ): void {
    if (Container.isInitialized) {
      container.resolve<SoftwareManagerLogger>(InjectTokens.Logger).debug('Container already initialized');
      return;
    }

    const singletonContainers: SingletonContainer[] = [
      new SingletonContainer(InjectTokens.Logger, WinstonLogger),
      new SingletonContainer(InjectTokens.ErrorHandler, ErrorHandler),
      new SingletonContainer(InjectTokens.ProcessRunner, ShellRunner),
      new SingletonContainer(InjectTokens.RandomStringGenerator, AlphanumericStringGenerator),
      new SingletonContainer(InjectTokens.RpmPackageManager, RpmPackageManager),
      new SingletonContainer(InjectTokens.PackageQueryHandleFactory, RepoqueryHandleFactory),
      new SingletonContainer(InjectTokens.YumPackageManager, YumPackageManager),
      new SingletonContainer(InjectTokens.Commands, PackageCommand),
    ];

    const valueContainers: ValueContainer[] = [
      new ValueContainer(InjectTokens.LogLevel, logLevel),
      new ValueContainer(InjectTokens.DevelopmentMode, developmentMode),
      new ValueContainer(InjectTokens.LogsDirectory, constants.SOFTWARE_MANAGER_LOGS_DIR),
      new ValueContainer(InjectTokens.PackageManagerCommand, constants.YUM),
      new ValueContainer(InjectTokens.RepoFilePath, constants.REPO_FILE_PATH),
      new ValueContainer(InjectTokens.RpmBuildDirectory, constants.RPMBUILD_DIR),
      new ValueContainer(InjectTokens.ImageModeMarkerPath, constants.IMAGE_MODE_MARKER_PATH),
      new ValueContainer(InjectTokens.TempDirectory, constants.SOFTWARE_MANAGER_TMP_DIR),
    ];

    for (const [token, override] of overrides) {
      if (override instanceof SingletonContainer) {
        container.register(token, {useClass: override.useClass}, {lifecycle: override.lifecycle});
      } else {
        container.register(token, {useValue: override.useValue});
      }
    }

    for (const value of valueContainers) {
      if (!overrides.has(value.token)) {
        container.register(value.token, {useValue: value.useValue});
      }
    }

    for (const singleton of singletonContainers) {
      if (!overrides.has(singleton.token)) {
        container.register(singleton.token, {useClass: singleton.useClass}, {lifecycle: singleton.lifecycle});
      }
    }

    container.resolve<SoftwareManagerLogger>(InjectTokens.Logger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   */
  public reset(logLevel?: string, developmentMode?: boolean, overrides?: InstanceOverrides): void {
    if (Container.isInitialized) {
      container.resolve<SoftwareManagerLogger>(InjectTokens.Logger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logLevel, developmentMode, overrides);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
