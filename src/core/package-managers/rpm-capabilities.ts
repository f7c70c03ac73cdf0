// SPDX-License-Identifier: Apache-2.0

/**
 * Low level RPM operations shared by the package manager backends of RPM based distributions.
 */
export interface RpmCapabilities {
  /**
   * Returns true if the package is installed, optionally at the given version and architecture.
   */
  checkInstalled(name: string, version?: string, arch?: string): Promise<boolean>;

  /**
   * Installs a local RPM file, this also installs source RPMs into the rpmbuild tree.
   */
  rpmInstall(filePath: string): Promise<boolean>;

  /**
   * Unpacks and patches the sources described by the spec file into the destination directory.
   * @returns the prepared source directory, or an empty string on failure
   */
  prepareSource(specFile: string, destPath: string | undefined, buildOption?: string): Promise<string>;

  listAll(): Promise<string[]>;

  listFiles(name: string): Promise<string[]>;
}
