// SPDX-License-Identifier: Apache-2.0

export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  Logger: Symbol.for('Logger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  ProcessRunner: Symbol.for('ProcessRunner'),
  RandomStringGenerator: Symbol.for('RandomStringGenerator'),
  PackageManagerCommand: Symbol.for('PackageManagerCommand'),
  RepoFilePath: Symbol.for('RepoFilePath'),
  RpmBuildDirectory: Symbol.for('RpmBuildDirectory'),
  ImageModeMarkerPath: Symbol.for('ImageModeMarkerPath'),
  TempDirectory: Symbol.for('TempDirectory'),
  RpmPackageManager: Symbol.for('RpmPackageManager'),
  PackageQueryHandleFactory: Symbol.for('PackageQueryHandleFactory'),
  YumPackageManager: Symbol.for('YumPackageManager'),
  Commands: Symbol.for('Commands'),
} as const;
