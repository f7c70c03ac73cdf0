// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {SoftwareManagerError} from '../../../../src/core/errors/software-manager-error.js';
import {CommandError} from '../../../../src/core/errors/command-error.js';
import {CommandNotFoundError} from '../../../../src/core/errors/command-not-found-error.js';
import {isErrnoException} from '../../../../src/core/errors/io-error.js';

describe('errors', (): void => {
  describe('SoftwareManagerError', (): void => {
    it('should carry the cause and its stack', (): void => {
      const cause: Error = new Error('disk full');
      const error: SoftwareManagerError = new SoftwareManagerError('write failed', cause, {path: '/tmp/x'});

      expect(error.name).to.equal('SoftwareManagerError');
      expect(error.message).to.equal('write failed');
      expect(error.cause).to.equal(cause);
      expect(error.meta).to.deep.equal({path: '/tmp/x'});
      expect(error.stack).to.contain(`\nCaused by: ${cause.stack}`);
    });

    it('should default to empty metadata', (): void => {
      expect(new SoftwareManagerError('failed').meta).to.deep.equal({});
    });
  });

  describe('CommandError', (): void => {
    it('should describe the failing command', (): void => {
      const error: CommandError = new CommandError({
        command: 'sudo yum -y install vim',
        exitCode: 1,
        stdout: '',
        stderr: 'No package vim available.',
      });

      expect(error).to.be.instanceOf(SoftwareManagerError);
      expect(error.name).to.equal('CommandError');
      expect(error.exitCode).to.equal(1);
      expect(error.meta).to.deep.equal({commandExitCode: 1});
      expect(error.message).to.equal(
        "Command exit with error code 1, [command: 'sudo yum -y install vim'], [message: 'No package vim available.']",
      );
    });
  });

  describe('CommandNotFoundError', (): void => {
    it('should name the missing command', (): void => {
      const error: CommandNotFoundError = new CommandNotFoundError('yum');

      expect(error.commandName).to.equal('yum');
      expect(error.message).to.equal("Command 'yum' could not be found in the system PATH");
    });
  });

  describe('isErrnoException', (): void => {
    it('should accept errors with a system error code', (): void => {
      const error: NodeJS.ErrnoException = new Error('no such file');
      error.code = 'ENOENT';

      expect(isErrnoException(error)).to.be.true;
    });

    it('should reject other values', (): void => {
      expect(isErrnoException(new Error('plain'))).to.be.false;
      expect(isErrnoException({code: 'ENOENT'})).to.be.false;
      expect(isErrnoException(undefined)).to.be.false;
    });
  });
});
