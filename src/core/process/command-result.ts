// SPDX-License-Identifier: Apache-2.0

export interface CommandResult {
  /** the command line as it was handed to the shell */
  readonly command: string;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}
