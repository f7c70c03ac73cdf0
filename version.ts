// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';

export function getSoftwareManagerVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  // package.json sits next to this file in the sources and one level up once compiled to dist/
  for (const candidate of ['./package.json', '../package.json']) {
    const packageJsonPath: string = path.resolve(__dirname, candidate);
    if (fs.existsSync(packageJsonPath)) {
      const packageJson: {version?: unknown} = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
      return String(packageJson.version);
    }
  }
  return 'unknown';
}
