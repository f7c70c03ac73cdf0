// SPDX-License-Identifier: Apache-2.0

import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import {container} from 'tsyringe-neo';
import {SoftwareManagerError} from './core/errors/software-manager-error.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type SoftwareManagerLogger} from './core/logging/software-manager-logger.js';
import {type PackageCommand} from './commands/package-command.js';
import * as constants from './core/constants.js';
import {getSoftwareManagerVersion} from '../version.js';

export class ArgumentProcessor {
  public static async process(argv: string[]): Promise<void> {
    const logger: SoftwareManagerLogger = container.resolve<SoftwareManagerLogger>(InjectTokens.Logger);
    const commands: PackageCommand = container.resolve<PackageCommand>(InjectTokens.Commands);

    logger.debug('Initializing commands');
    const rootCmd = yargs(hideBin(argv))
      .scriptName('swm')
      .usage('Usage:\n  swm <command> [options]')
      .option('package-manager', {
        alias: 'p',
        type: 'string',
        default: constants.YUM,
        describe: 'yum compatible package manager to drive, eg. dnf',
      })
      .option('dev', {type: 'boolean', default: false, describe: 'show full stack traces in error messages'})
      .alias('h', 'help')
      .version(getSoftwareManagerVersion())
      .strict()
      .demandCommand(1, 'Select a command')
      .middleware((arguments_): void => {
        logger.setDevMode(arguments_.dev);
        container.register(InjectTokens.PackageManagerCommand, {useValue: arguments_.packageManager});
      });

    // Expand the terminal width to the maximum available
    rootCmd.wrap(null);

    rootCmd.fail((message: string | undefined, error: Error | undefined): void => {
      if (error) {
        throw error;
      }
      logger.showUser(message);
      rootCmd.showHelp();
      throw new SoftwareManagerError(message ?? 'Invalid command line');
    });

    logger.debug('Parsing root command (executing the commands)');
    await commands.register(rootCmd).parseAsync();
  }
}
