// SPDX-License-Identifier: Apache-2.0

/**
 * Returns true if the given value is an error raised by a Node.js system call, i.e. it carries a string `code`
 * such as ENOENT or EACCES.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
