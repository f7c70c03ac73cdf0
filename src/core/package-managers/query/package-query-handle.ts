// SPDX-License-Identifier: Apache-2.0

/**
 * Access to the package database of the package manager, used for reverse lookups.
 */
export interface PackageQueryHandle {
  /**
   * Returns the packages that provide any of the given capabilities, globs are allowed.
   */
  searchPackageProvides(patterns: string[]): Promise<string[]>;
}

export interface PackageQueryHandleFactory {
  /**
   * @returns the handle, or undefined when the package database cannot be queried on this host
   */
  create(): Promise<PackageQueryHandle | undefined>;
}
