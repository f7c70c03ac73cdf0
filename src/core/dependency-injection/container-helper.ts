// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {SoftwareManagerError} from '../errors/software-manager-error.js';

/**
 * Returns the parameter if it was provided, otherwise resolves it from the dependency injection container.
 *
 * Constructors can then be called directly (tests) as well as resolved by the container.
 *
 * @param parameter - the value handed to the constructor, if any
 * @param token - the token the value is registered under
 * @param callingClass - the name of the class being constructed, used in the error message
 */
export function patchInject<T>(parameter: T | undefined, token: symbol, callingClass: string): T {
  if (parameter !== undefined && parameter !== null) {
    return parameter;
  }
  if (!container.isRegistered(token, true)) {
    throw new SoftwareManagerError(
      `Unable to resolve ${token.description ?? token.toString()} for ${callingClass}, it is not registered`,
    );
  }
  return container.resolve<T>(token);
}
