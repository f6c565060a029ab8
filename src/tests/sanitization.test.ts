import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import sinon from 'sinon';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { logger } from '../lib/logger';
import {
  ValidationError,
  expandHomePath,
  sanitizeNumber,
  sanitizePort,
  sanitizeSSHHost,
  sanitizeSSHKeyPath,
  sanitizeSSHUsername,
} from '../lib/sanitization';

describe('sanitization', () => {
  let sandbox: sinon.SinonSandbox;
  let warn: sinon.SinonStub;

  beforeEach(() => {
    sandbox = sinon.createSandbox();
    warn = sandbox.stub(logger, 'warn');
  });

  afterEach(() => {
    sandbox.restore();
  });

  it('should accept hostnames, IPv4 and IPv6 addresses', () => {
    expect(sanitizeSSHHost('  build-01.example.test ')).to.equal(
      'build-01.example.test'
    );
    expect(sanitizeSSHHost('192.168.1.100')).to.equal('192.168.1.100');
    expect(sanitizeSSHHost('fe80::1')).to.equal('fe80::1');
  });

  it('should reject missing or malformed hosts', () => {
    expect(() => sanitizeSSHHost(undefined)).to.throw(
      ValidationError,
      'SSH host is required'
    );
    expect(() => sanitizeSSHHost('   ')).to.throw(
      ValidationError,
      'SSH host cannot be empty'
    );
    expect(() => sanitizeSSHHost('bad host;rm')).to.throw(
      ValidationError,
      'SSH host must be a valid hostname or IP address'
    );
  });

  it('should validate usernames and warn about root', () => {
    expect(sanitizeSSHUsername(' deploy ')).to.equal('deploy');
    expect(sanitizeSSHUsername('Admin.User')).to.equal('Admin.User');
    expect(warn.called).to.equal(false);

    expect(sanitizeSSHUsername('root')).to.equal('root');
    expect(
      warn.calledOnceWith(
        'Using root user for SSH connections is not recommended'
      )
    ).to.equal(true);

    expect(() => sanitizeSSHUsername('-x')).to.throw(
      ValidationError,
      'SSH username contains invalid characters'
    );
  });

  it('should parse ports with a default of 22', () => {
    expect(sanitizePort(undefined)).to.equal(22);
    expect(sanitizePort('')).to.equal(22);
    expect(sanitizePort('2222')).to.equal(2222);
    expect(sanitizePort(8022)).to.equal(8022);
    expect(() => sanitizePort('ssh')).to.throw(
      ValidationError,
      'SSH port must be a valid number'
    );
    expect(() => sanitizePort('70000')).to.throw(
      ValidationError,
      'SSH port cannot exceed 65535'
    );
  });

  it('should enforce numeric bounds', () => {
    expect(sanitizeNumber('0', 'delay', 0, 100)).to.equal(0);
    expect(() => sanitizeNumber('-1', 'delay', 0, 100)).to.throw(
      ValidationError,
      'delay must be at least 0'
    );
    expect(() => sanitizeNumber('1.5', 'delay')).to.throw(
      ValidationError,
      'delay must be a valid number'
    );
  });

  it('should expand a leading tilde', () => {
    expect(expandHomePath('~/.ssh/id_rsa')).to.equal(
      path.join(os.homedir(), '.ssh/id_rsa')
    );
    expect(expandHomePath('/etc/ssh/key')).to.equal('/etc/ssh/key');
  });

  describe('sanitizeSSHKeyPath', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ssh-batch-key-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should resolve an existing private key file', () => {
      const key = path.join(dir, 'id_ed25519');
      fs.writeFileSync(key, 'test-key', { mode: 0o600 });
      fs.chmodSync(key, 0o600);

      expect(sanitizeSSHKeyPath(key)).to.equal(key);
      expect(warn.called).to.equal(false);
    });

    it('should warn when the key is readable by others', () => {
      const key = path.join(dir, 'id_rsa');
      fs.writeFileSync(key, 'test-key');
      fs.chmodSync(key, 0o644);

      sanitizeSSHKeyPath(key);

      expect(warn.calledOnce).to.equal(true);
    });

    it('should reject a missing key or a directory', () => {
      const missing = path.join(dir, 'nope');

      expect(() => sanitizeSSHKeyPath(missing)).to.throw(
        ValidationError,
        `SSH key file does not exist: ${missing}`
      );
      expect(() => sanitizeSSHKeyPath(dir)).to.throw(
        ValidationError,
        'SSH key path must point to a file'
      );
    });
  });
});
