// SPDX-License-Identifier: Apache-2.0

import {type ClassProvider, Lifecycle} from 'tsyringe-neo';

export class SingletonContainer<T = unknown> {
  public lifecycle: Lifecycle;

  public constructor(
    public token: symbol,
    public useClass: ClassProvider<T>['useClass'],
  ) {
    this.lifecycle = Lifecycle.Singleton;
  }
}
