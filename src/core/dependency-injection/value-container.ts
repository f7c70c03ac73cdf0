// SPDX-License-Identifier: Apache-2.0

export class ValueContainer<T = unknown> {
  public constructor(
    public token: symbol,
    public useValue: T,
  ) {}
}
