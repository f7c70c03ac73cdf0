// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import {FakeProcessRunner} from '../../../helpers/fake-process-runner.js';
import {MemoryLogger} from '../../../helpers/memory-logger.js';
import {RpmPackageManager} from '../../../../src/core/package-managers/rpm-package-manager.js';

describe('RpmPackageManager', (): void => {
  let testDirectory: string;
  let runner: FakeProcessRunner;
  let logger: MemoryLogger;
  let rpm: RpmPackageManager;

  beforeEach((): void => {
    testDirectory = fs.mkdtempSync(path.join(os.tmpdir(), 'rpm-package-manager-test-'));
    runner = new FakeProcessRunner();
    logger = new MemoryLogger();
    rpm = new RpmPackageManager(runner, logger);
  });

  afterEach((): void => {
    fs.rmSync(testDirectory, {recursive: true, force: true});
  });

  describe('checkInstalled', (): void => {
    it('should query the package with version and architecture', async (): Promise<void> => {
      expect(await rpm.checkInstalled('vim', '9.0', 'x86_64')).to.be.true;
      expect(runner.calls).to.deep.equal([{command: 'rpm -q vim-9.0.x86_64', options: {ignoreStatus: true}}]);
    });

    it('should report a package that is not installed', async (): Promise<void> => {
      runner.on(/^rpm -q /, {exitCode: 1, stdout: 'package vim is not installed\n'});

      expect(await rpm.checkInstalled('vim')).to.be.false;
      expect(runner.commands()).to.deep.equal(['rpm -q vim']);
    });
  });

  describe('rpmInstall', (): void => {
    it('should install an existing package file with sudo', async (): Promise<void> => {
      const packageFile: string = path.join(testDirectory, 'vim-9.0-1.el9.src.rpm');
      fs.writeFileSync(packageFile, '');

      expect(await rpm.rpmInstall(packageFile)).to.be.true;
      expect(runner.calls).to.deep.equal([{command: `rpm -i ${packageFile}`, options: {sudo: true}}]);
    });

    it('should quote a package path the shell would split', async (): Promise<void> => {
      const packageFile: string = path.join(testDirectory, 'my vim.rpm');
      fs.writeFileSync(packageFile, '');

      expect(await rpm.rpmInstall(packageFile)).to.be.true;
      expect(runner.commands()).to.deep.equal([`rpm -i '${packageFile}'`]);
    });

    it('should not run rpm for a missing file', async (): Promise<void> => {
      const packageFile: string = path.join(testDirectory, 'missing.rpm');

      expect(await rpm.rpmInstall(packageFile)).to.be.false;
      expect(runner.calls).to.have.lengthOf(0);
      expect(logger.messages('error')).to.deep.equal([`Package file '${packageFile}' does not exist`]);
    });

    it('should report a failing installation', async (): Promise<void> => {
      const packageFile: string = path.join(testDirectory, 'broken.rpm');
      fs.writeFileSync(packageFile, '');
      runner.on(/^rpm -i /, {exitCode: 1, stderr: 'not an rpm package'});

      expect(await rpm.rpmInstall(packageFile)).to.be.false;
      expect(logger.messages('error')).to.deep.equal([
        `Command exit with error code 1, [command: 'rpm -i ${packageFile}'], [message: 'not an rpm package']`,
      ]);
    });
  });

  describe('prepareSource', (): void => {
    let specFile: string;
    let destination: string;

    beforeEach((): void => {
      specFile = path.join(testDirectory, 'vim.spec');
      fs.writeFileSync(specFile, 'Name: vim\n');
      destination = path.join(testDirectory, 'build');
      fs.mkdirSync(destination);
    });

    it('should run rpmbuild into the destination and return the prepared directory', async (): Promise<void> => {
      runner.on(/^rpmbuild /, (): void => {
        fs.mkdirSync(path.join(destination, 'vim-9.0'));
      });

      expect(await rpm.prepareSource(specFile, destination)).to.equal(path.join(destination, 'vim-9.0'));
      expect(runner.commands()).to.deep.equal([`rpmbuild -bp --define '_builddir ${destination}' ${specFile}`]);
    });

    it('should pass the requested build option', async (): Promise<void> => {
      runner.on(/^rpmbuild /, (): void => {
        fs.mkdirSync(path.join(destination, 'vim-9.0'));
        fs.mkdirSync(path.join(destination, 'BUILDROOT'));
      });

      expect(await rpm.prepareSource(specFile, destination, '-bc')).to.equal(path.join(destination, 'BUILDROOT'));
      expect(runner.commands()).to.deep.equal([`rpmbuild -bc --define '_builddir ${destination}' ${specFile}`]);
    });

    it('should require an existing spec file', async (): Promise<void> => {
      expect(await rpm.prepareSource(path.join(testDirectory, 'missing.spec'), destination)).to.equal('');
      expect(runner.calls).to.have.lengthOf(0);
      expect(logger.messages('error')).to.deep.equal(['Please provide valid spec file']);
    });

    it('should require a destination', async (): Promise<void> => {
      expect(await rpm.prepareSource(specFile, undefined)).to.equal('');
      expect(await rpm.prepareSource(specFile, '')).to.equal('');
      expect(runner.calls).to.have.lengthOf(0);
      expect(logger.messages('error')).to.deep.equal(['Please provide valid dest_path', 'Please provide valid dest_path']);
    });

    it('should return an empty string when rpmbuild fails', async (): Promise<void> => {
      runner.on(/^rpmbuild /, {exitCode: 1, stderr: 'bad spec'});

      expect(await rpm.prepareSource(specFile, destination)).to.equal('');
    });

    it('should return an empty string when nothing was prepared', async (): Promise<void> => {
      expect(await rpm.prepareSource(specFile, destination)).to.equal('');
      expect(logger.messages('error')).to.deep.equal([`No sources were prepared in ${destination}`]);
    });
  });

  describe('listing', (): void => {
    it('should list the installed packages', async (): Promise<void> => {
      runner.on(/^rpm -qa$/, {stdout: 'bash-5.1.8-9.el9.x86_64\nvim-9.0-1.el9.x86_64\n'});

      expect(await rpm.listAll()).to.deep.equal(['bash-5.1.8-9.el9.x86_64', 'vim-9.0-1.el9.x86_64']);
    });

    it('should list the files of a package', async (): Promise<void> => {
      runner.on(/^rpm -ql vim$/, {stdout: '/usr/bin/vim\n/usr/share/vim\n'});

      expect(await rpm.listFiles('vim')).to.deep.equal(['/usr/bin/vim', '/usr/share/vim']);
    });

    it('should return no entries when rpm fails', async (): Promise<void> => {
      runner.failAll();

      expect(await rpm.listAll()).to.deep.equal([]);
      expect(await rpm.listFiles('vim')).to.deep.equal([]);
    });
  });
});
