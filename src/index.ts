// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import {container} from 'tsyringe-neo';
import {type SoftwareManagerLogger} from './core/logging/software-manager-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {SoftwareManagerError} from './core/errors/software-manager-error.js';
import {ArgumentProcessor} from './argument-processor.js';

export {Container} from './core/dependency-injection/container-init.js';
export {InjectTokens} from './core/dependency-injection/inject-tokens.js';
export {type PackageManager} from './core/package-managers/package-manager.js';
export {type RpmCapabilities} from './core/package-managers/rpm-capabilities.js';
export {YumPackageManager} from './core/package-managers/yum-package-manager.js';
export {RpmPackageManager} from './core/package-managers/rpm-package-manager.js';
export {RepoConfig, type RepoOptions} from './core/package-managers/repository/repo-config.js';
export {
  type PackageQueryHandle,
  type PackageQueryHandleFactory,
} from './core/package-managers/query/package-query-handle.js';
export {type ProcessRunner} from './core/process/process-runner.js';
export {type CommandResult} from './core/process/command-result.js';
export {type CommandOptions} from './core/process/command-options.js';
export {ShellRunner} from './core/shell-runner.js';
export {SoftwareManagerError} from './core/errors/software-manager-error.js';
export {CommandError} from './core/errors/command-error.js';
export {CommandNotFoundError} from './core/errors/command-not-found-error.js';

export async function main(argv: string[]): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    console.error(`Error initializing container: ${error instanceof Error ? error.message : String(error)}`, error);
    throw new SoftwareManagerError('Error initializing container', error);
  }

  const logger: SoftwareManagerLogger = container.resolve<SoftwareManagerLogger>(InjectTokens.Logger);
  logger.debug('Initializing software manager CLI');

  return ArgumentProcessor.process(argv);
}
