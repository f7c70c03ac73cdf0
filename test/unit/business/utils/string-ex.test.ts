// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {StringEx} from '../../../../src/business/utils/string-ex.js';

describe('StringEx', (): void => {
  describe('isEmpty', (): void => {
    it('should return true for missing or blank strings', (): void => {
      expect(StringEx.isEmpty('')).to.be.true;
      expect(StringEx.isEmpty('  ')).to.be.true;
      expect(StringEx.isEmpty(undefined)).to.be.true;
      expect(StringEx.isEmpty(null)).to.be.true;
    });

    it('should return false for non-empty strings', (): void => {
      expect(StringEx.isEmpty('vim')).to.be.false;
    });
  });

  describe('shellQuote', (): void => {
    it('should leave plain words as they are', (): void => {
      expect(StringEx.shellQuote('vim')).to.equal('vim');
      expect(StringEx.shellQuote('/tmp/vim-9.0.x86_64.rpm')).to.equal('/tmp/vim-9.0.x86_64.rpm');
    });

    it('should wrap globs and metacharacters in single quotes', (): void => {
      expect(StringEx.shellQuote('*/bash')).to.equal("'*/bash'");
      expect(StringEx.shellQuote('kernel*')).to.equal("'kernel*'");
      expect(StringEx.shellQuote('vim; reboot')).to.equal("'vim; reboot'");
      expect(StringEx.shellQuote('$(id)')).to.equal("'$(id)'");
    });

    it('should quote the empty string', (): void => {
      expect(StringEx.shellQuote('')).to.equal("''");
    });

    it('should escape embedded single quotes', (): void => {
      expect(StringEx.shellQuote("it's")).to.equal(String.raw`'it'\''s'`);
    });
  });

  describe('lines', (): void => {
    it('should return the trimmed non-empty lines', (): void => {
      expect(StringEx.lines('  first\r\n\nsecond  \n\n')).to.deep.equal(['first', 'second']);
      expect(StringEx.lines('')).to.deep.equal([]);
    });
  });

  describe('joinArguments', (): void => {
    it('should skip empty and missing parts', (): void => {
      expect(StringEx.joinArguments('/usr/bin/yum -y', 'update', undefined, '')).to.equal('/usr/bin/yum -y update');
    });
  });
});
