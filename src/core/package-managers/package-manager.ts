// SPDX-License-Identifier: Apache-2.0

import {type RepoOptions} from './repository/repo-config.js';

/**
 * Operations of a software manager backend.
 *
 * Failures are reported through the returned value and the log rather than thrown: `false` for actions, an empty
 * string for paths and `undefined` for lookups.
 */
export interface PackageManager {
  install(name: string): Promise<boolean>;
  remove(name: string): Promise<boolean>;
  /** upgrades the named packages, or every installed package when no name is given */
  upgrade(name?: string): Promise<boolean>;
  addRepo(url: string, options?: RepoOptions): Promise<boolean>;
  removeRepo(url: string): Promise<boolean>;
  provides(name: string): Promise<string | undefined>;
  buildDep(name: string): Promise<boolean>;
  getSource(name: string, destPath: string | undefined, buildOption?: string): Promise<string>;
  checkInstalled(name: string, version?: string, arch?: string): Promise<boolean>;
  listAll(): Promise<string[]>;
  listFiles(name: string): Promise<string[]>;
  cleanCache(): Promise<boolean>;
  getVersion(): Promise<string>;
}
