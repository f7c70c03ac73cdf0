// SPDX-License-Identifier: Apache-2.0

import * as winston from 'winston';
import {v4 as uuidv4} from 'uuid';
import * as util from 'node:util';
import path from 'node:path';
import chalk from 'chalk';
import * as constants from '../constants.js';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type LogMeta, type SoftwareManagerLogger} from './software-manager-logger.js';

const customFormat = winston.format.combine(
  winston.format.splat(),

  // include timestamp in logs
  winston.format.timestamp(),

  winston.format.ms(),

  // convert levels to upper case
  winston.format(data => {
    data.level = data.level.toUpperCase();
    return data;
  })(),

  // use custom format TIMESTAMP|LEVEL| MESSAGE
  winston.format.printf(data => `${String(data.timestamp)}|${data.level}| ${String(data.message)}`),

  // Ignore log messages if they have { private: true }
  winston.format(data => (data.private ? false : data))(),
);

interface ErrorFrame {
  message: string;
  stacktrace?: string;
}

@injectable()
export class WinstonLogger implements SoftwareManagerLogger {
  private readonly winstonLogger: winston.Logger;
  private traceId?: string;
  private developmentMode: boolean;
  private readonly MINOR_LINE_SEPARATOR: string =
    '-------------------------------------------------------------------------------';

  /**
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logsDirectory - the directory the log file is written to
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
  ) {
    logLevel = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    logsDirectory = patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name);

    this.nextTraceId();

    this.winstonLogger = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(customFormat, winston.format.json()),
      transports: [
        new winston.transports.File({filename: path.join(logsDirectory, constants.SOFTWARE_MANAGER_LOG_FILE)}),
      ],
    });
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: LogMeta = {}): LogMeta {
    meta.traceId = this.traceId;
    return meta;
  }

  public showUser(message: unknown, ...arguments_: unknown[]): void {
    console.log(util.format(message, ...arguments_));
    this.info(util.format(message, ...arguments_));
  }

  public showUserError(error: unknown): void {
    const stack: ErrorFrame[] = [];
    let current: unknown = error;
    // walk the cause chain, at most 10 levels deep
    while (current !== undefined && stack.length <= 10) {
      if (current instanceof Error) {
        stack.push({message: current.message, stacktrace: current.stack});
        current = current.cause;
      } else {
        stack.push({message: String(current)});
        current = undefined;
      }
    }

    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix: string = '';
      let indent: string = '';
      for (const s of stack) {
        console.log(indent + prefix + chalk.yellow(s.message));
        if (s.stacktrace) {
          // Remove everything after the first "Caused by: " and add indentation
          const formattedStacktrace: string = s.stacktrace
            .replace(/Caused by:.*/s, '')
            .replaceAll(/\n\s*/g, '\n' + indent)
            .trim();
          console.log(indent + chalk.gray(formattedStacktrace) + '\n');
        }
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      for (const line of stack[0].message.split('\n')) {
        console.log(chalk.yellow(line));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.error(stack[0].message, error);
  }

  public showList(title: string, items: string[] = []): boolean {
    this.showUser(chalk.green(`\n *** ${title} ***`));
    this.showUser(chalk.green(this.MINOR_LINE_SEPARATOR));
    if (items.length > 0) {
      for (const name of items) {
        this.showUser(chalk.cyan(` - ${name}`));
      }
    } else {
      this.showUser(chalk.blue('[ None ]'));
    }

    this.showUser('\n');
    return true;
  }

  public error(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.error(util.format(message), ...arguments_, this.prepMeta());
  }

  public warn(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.warn(util.format(message), ...arguments_, this.prepMeta());
  }

  public info(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.info(util.format(message), ...arguments_, this.prepMeta());
  }

  public debug(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.debug(util.format(message), ...arguments_, this.prepMeta());
  }
}
