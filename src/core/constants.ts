// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import path from 'node:path';

export function getEnvironmentVariable(name: string): string | undefined {
  const value: string | undefined = process.env[name];
  return value ? value : undefined;
}

// -------------------- software manager related constants ---------------------------------------------------------
export const HOME_DIR: string = os.homedir();
export const SOFTWARE_MANAGER_HOME_DIR: string =
  getEnvironmentVariable('SOFTWARE_MANAGER_HOME') || path.join(HOME_DIR, '.software-manager');
export const SOFTWARE_MANAGER_LOGS_DIR: string = path.join(SOFTWARE_MANAGER_HOME_DIR, 'logs');
export const SOFTWARE_MANAGER_LOG_FILE: string = 'software-manager.log';
export const SOFTWARE_MANAGER_LOG_LEVEL: string = getEnvironmentVariable('SOFTWARE_MANAGER_LOG_LEVEL') || 'info';
export const SOFTWARE_MANAGER_TMP_DIR: string = getEnvironmentVariable('SOFTWARE_MANAGER_TMP_DIR') || os.tmpdir();

// -------------------- package manager related constants ----------------------------------------------------------
export const YUM: string = 'yum';
/** oldest yum release whose command line is known to work */
export const MINIMUM_YUM_VERSION: string = '3.4.3';
export const YUM_BUILDDEP: string = 'yum-builddep';
export const YUMDOWNLOADER: string = 'yumdownloader';
export const REPOQUERY: string = 'repoquery';
export const RPM: string = 'rpm';
export const RPMBUILD: string = 'rpmbuild';

/** repository file owned by this tool, every other file under /etc/yum.repos.d is left alone */
export const REPO_FILE_PATH: string =
  getEnvironmentVariable('SOFTWARE_MANAGER_REPO_FILE') || '/etc/yum.repos.d/avocado-managed.repo';
export const REPO_DISPLAY_NAME: string = 'Software manager managed repository';
export const REPO_SECTION_PREFIX: string = 'software_manager_';
export const REPO_SECTION_SUFFIX_LENGTH: number = 4;
export const DEFAULT_REPO_OPTIONS: Readonly<Record<string, string>> = {enabled: '1', gpgcheck: '0'};

export const TEMP_FILE_PREFIX: string = 'software_manager';
export const RPMBUILD_DIR: string = path.join(HOME_DIR, 'rpmbuild');
/** present on image mode (bootc/ostree) hosts, where package changes must be transient */
export const IMAGE_MODE_MARKER_PATH: string = '/ostree';
export const TRANSIENT_FLAG: string = '--transient';
export const SOURCE_PACKAGE_HELPERS: readonly string[] = ['rpm-build', 'yum-utils'];
export const SOURCE_PACKAGE_EXTENSION: string = '.src.rpm';
export const DEFAULT_BUILD_OPTION: string = '-bp';
