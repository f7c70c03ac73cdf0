// SPDX-License-Identifier: Apache-2.0

import {SoftwareManagerError} from '../../core/errors/software-manager-error.js';

export class StringEx {
  public static readonly EMPTY: string = '';
  public static readonly SPACE: string = ' ';
  private static readonly SHELL_SAFE: RegExp = /^[\w@%+=:,./-]+$/;

  private constructor() {
    throw new SoftwareManagerError('This class cannot be instantiated');
  }

  public static isEmpty(value: string | undefined | null): boolean {
    return !value || value.trim().length === 0;
  }

  /**
   * Returns the value as a single shell word that reaches the program untouched, globs and metacharacters
   * included. Values made only of safe characters are returned as they are.
   */
  public static shellQuote(value: string): string {
    if (StringEx.SHELL_SAFE.test(value)) {
      return value;
    }
    return `'${value.replaceAll("'", String.raw`'\''`)}'`;
  }

  /** Returns the non-empty, trimmed lines of the value */
  public static lines(value: string): string[] {
    return value
      .split(/\r?\n/)
      .map((line: string): string => line.trim())
      .filter((line: string): boolean => line.length > 0);
  }

  /** Joins the non-empty parts with a single space */
  public static joinArguments(...parts: (string | undefined)[]): string {
    return parts.filter((part: string | undefined): part is string => !StringEx.isEmpty(part)).join(StringEx.SPACE);
  }
}
