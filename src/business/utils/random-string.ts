// SPDX-License-Identifier: Apache-2.0

import {randomInt} from 'node:crypto';
import {injectable} from 'tsyringe-neo';

export interface RandomStringGenerator {
  generate(length: number): string;
}

/**
 * Generates random strings made of ASCII letters and digits.
 */
@injectable()
export class AlphanumericStringGenerator implements RandomStringGenerator {
  public static readonly CHARACTERS: string = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

  public generate(length: number): string {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Invalid random string length: ${length}`);
    }

    let value: string = '';
    for (let index: number = 0; index < length; index++) {
      value += AlphanumericStringGenerator.CHARACTERS[randomInt(AlphanumericStringGenerator.CHARACTERS.length)];
    }
    return value;
  }
}
