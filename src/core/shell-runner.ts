// SPDX-License-Identifier: Apache-2.0

import {type ChildProcessWithoutNullStreams, spawn} from 'node:child_process';
import {type SoftwareManagerLogger} from './logging/software-manager-logger.js';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type ProcessRunner} from './process/process-runner.js';
import {type CommandOptions} from './process/command-options.js';
import {type CommandResult} from './process/command-result.js';
import {CommandError} from './errors/command-error.js';
import {CommandNotFoundError} from './errors/command-not-found-error.js';
import {StringEx} from '../business/utils/string-ex.js';

@injectable()
export class ShellRunner implements ProcessRunner {
  private readonly logger: SoftwareManagerLogger;

  public constructor(@inject(InjectTokens.Logger) logger?: SoftwareManagerLogger) {
    this.logger = patchInject(logger, InjectTokens.Logger, this.constructor.name);
  }

  /**
   * Prefixes the command with sudo when requested, unless the process is already running as root.
   */
  public static buildCommandLine(command: string, sudo: boolean = false, isRoot: boolean = ShellRunner.isRoot()): string {
    return sudo && !isRoot ? `sudo ${command}` : command;
  }

  public static isRoot(): boolean {
    return process.getuid?.() === 0;
  }

  /** Returns a promise that invokes the shell command */
  public async run(command: string, options: CommandOptions = {}): Promise<CommandResult> {
    const commandLine: string = ShellRunner.buildCommandLine(command, options.sudo);
    const message: string = `Executing command: '${commandLine}'`;
    const callStack: string | undefined = new Error(message).stack; // capture the callstack to be included in error
    this.logger.info(message);

    return new Promise<CommandResult>((resolve, reject): void => {
      const child: ChildProcessWithoutNullStreams = spawn(commandLine, {shell: true});

      const output: string[] = [];
      child.stdout.on('data', (data: Buffer): void => {
        output.push(data.toString());
      });

      const errorOutput: string[] = [];
      child.stderr.on('data', (data: Buffer): void => {
        errorOutput.push(data.toString());
      });

      child.on('error', (error: Error): void => {
        this.logger.error(`Error spawning: '${commandLine}'`, {error: {message: error.message, stack: error.stack}});
        reject(error);
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null): void => {
        const result: CommandResult = {
          command: commandLine,
          // a process terminated by a signal has no exit code
          exitCode: code ?? 1,
          stdout: output.join(''),
          stderr: errorOutput.join('').trim(),
        };

        if (result.exitCode !== 0 && !options.ignoreStatus) {
          const error: CommandError = new CommandError(result);

          // include the callStack to the parent run() instead of from inside this handler.
          // this is needed to ensure we capture the proper callstack for easier debugging.
          if (callStack) {
            error.stack = callStack;
          }

          this.logger.error(`Error executing: '${commandLine}'`, {
            commandExitCode: code,
            commandExitSignal: signal,
            commandOutput: result.stdout,
            errOutput: result.stderr,
            error: {message: error.message, stack: error.stack},
          });

          reject(error);
          return;
        }

        this.logger.debug(
          `Finished executing: '${commandLine}', ${JSON.stringify({
            commandExitCode: code,
            commandExitSignal: signal,
            commandOutput: result.stdout,
            errOutput: result.stderr,
          })}`,
        );

        resolve(result);
      });
    });
  }

  public async findCommand(name: string): Promise<string> {
    const result: CommandResult = await this.run(`command -v ${StringEx.shellQuote(name)}`, {ignoreStatus: true});
    const resolved: string = result.stdout.trim().split(/\r?\n/)[0] ?? '';
    if (result.exitCode !== 0 || !resolved) {
      throw new CommandNotFoundError(name);
    }
    return resolved;
  }
}
