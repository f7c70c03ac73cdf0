#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import {container} from 'tsyringe-neo';
import * as swm from './src/index.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {type ErrorHandler} from './src/core/error-handler.js';

await swm.main(process.argv).catch((error: unknown): void => {
  if (!container.isRegistered(InjectTokens.ErrorHandler, true)) {
    console.error(error);
    process.exitCode = 1;
    return;
  }
  container.resolve<ErrorHandler>(InjectTokens.ErrorHandler).handle(error);
});
