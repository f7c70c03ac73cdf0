// SPDX-License-Identifier: Apache-2.0

import sinon, {type SinonSpy, type SinonStub} from 'sinon';
import {expect} from 'chai';
import {describe, it, afterEach, before, beforeEach} from 'mocha';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import chalk from 'chalk';

import {WinstonLogger} from '../../../../src/core/logging/winston-logger.js';
import {type LogMeta} from '../../../../src/core/logging/software-manager-logger.js';
import {SoftwareManagerError} from '../../../../src/core/errors/software-manager-error.js';

const HEADER: string = '*********************************** ERROR *****************************************';
const FOOTER: string = '***********************************************************************************';

describe('WinstonLogger', (): void => {
  // the file transport opens its stream in the background, the directory is left for the OS to clean up
  let logsDirectory: string;
  let logger: WinstonLogger;
  let consoleStub: SinonStub;

  before((): void => {
    logsDirectory = fs.mkdtempSync(path.join(os.tmpdir(), 'winston-logger-test-'));
  });

  beforeEach((): void => {
    logger = new WinstonLogger('debug', false, logsDirectory);
    consoleStub = sinon.stub(console, 'log');
  });

  afterEach((): void => sinon.restore());

  it('should add the current trace id to the log metadata', (): void => {
    const {traceId} = logger.prepMeta();
    expect(traceId).to.be.a('string');

    const meta: LogMeta = logger.prepMeta({commandExitCode: 1});
    expect(meta).to.deep.equal({commandExitCode: 1, traceId});

    logger.nextTraceId();
    expect(logger.prepMeta().traceId).to.not.equal(traceId);
  });

  it('should print user messages and record them', (): void => {
    const infoSpy: SinonSpy = sinon.spy(logger, 'info');

    logger.showUser('Installed %s in %d attempts', 'vim', 2);

    expect(consoleStub).to.have.been.calledOnceWithExactly('Installed vim in 2 attempts');
    expect(infoSpy).to.have.been.calledOnceWithExactly('Installed vim in 2 attempts');
  });

  it('should show only the top error message outside development mode', (): void => {
    const errorSpy: SinonSpy = sinon.spy(logger, 'error');
    const error: SoftwareManagerError = new SoftwareManagerError('write failed', new Error('disk full'));

    logger.showUserError(error);

    expect(consoleStub.args).to.deep.equal([[chalk.red(HEADER)], [chalk.yellow('write failed')], [chalk.red(FOOTER)]]);
    expect(errorSpy).to.have.been.calledOnceWithExactly('write failed', error);
  });

  it('should show the cause chain in development mode', (): void => {
    logger.setDevMode(true);

    logger.showUserError(new SoftwareManagerError('write failed', new Error('disk full')));

    const printed: string[] = consoleStub.args.map((arguments_: unknown[]): string => String(arguments_[0]));
    expect(printed).to.include(chalk.yellow('write failed'));
    expect(printed).to.include('  Caused by: ' + chalk.yellow('disk full'));
  });

  it('should show a placeholder for an empty list', (): void => {
    expect(logger.showList('Installed packages', [])).to.be.true;

    expect(consoleStub.args).to.deep.equal([
      [chalk.green('\n *** Installed packages ***')],
      [chalk.green('-------------------------------------------------------------------------------')],
      [chalk.blue('[ None ]')],
      ['\n'],
    ]);
  });
});
