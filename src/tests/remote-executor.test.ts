import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import sinon from 'sinon';
import { NodeSSH, SSHExecCommandOptions } from 'node-ssh';
import {
  RemoteExecutor,
  classifyConnectError,
} from '../classes/remote-executor';
import { ConnectionParameters } from '../interfaces';
import {
  ChannelError,
  ConnectionError,
  ConnectionLostError,
} from '../lib/errors';

const passwordParams: ConnectionParameters = {
  host: 'example.test',
  port: 2222,
  username: 'deploy',
  credential: { kind: 'password', password: 'test-password' },
};

function sshError(message: string, extra: { level?: string; code?: string }) {
  return Object.assign(new Error(message), extra);
}

async function captureError(action: () => Promise<unknown>): Promise<unknown> {
  try {
    await action();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to fail');
}

describe('RemoteExecutor', () => {
  let sandbox: sinon.SinonSandbox;

  beforeEach(() => {
    sandbox = sinon.createSandbox();
  });

  afterEach(() => {
    sandbox.restore();
  });

  describe('buildConfig', () => {
    it('should pass the password for password authentication', () => {
      const config = new RemoteExecutor(passwordParams).buildConfig();

      expect(config).to.deep.equal({
        host: 'example.test',
        port: 2222,
        username: 'deploy',
        password: 'test-password',
      });
    });

    it('should pass the key path and passphrase for key authentication', () => {
      const config = new RemoteExecutor({
        ...passwordParams,
        port: 22,
        credential: {
          kind: 'key',
          keyPath: '/home/deploy/.ssh/id_ed25519',
          passphrase: 'test-passphrase',
        },
        readyTimeout: 5000,
      }).buildConfig();

      expect(config).to.deep.equal({
        host: 'example.test',
        port: 22,
        username: 'deploy',
        readyTimeout: 5000,
        privateKeyPath: '/home/deploy/.ssh/id_ed25519',
        passphrase: 'test-passphrase',
      });
    });
  });

  describe('connect', () => {
    it('should report authentication failures as ConnectionError(auth)', async () => {
      sandbox
        .stub(NodeSSH.prototype, 'connect')
        .rejects(
          sshError('All configured authentication methods failed', {
            level: 'client-authentication',
          })
        );

      const error = await captureError(() =>
        new RemoteExecutor(passwordParams).connect()
      );

      expect(error).to.be.instanceOf(ConnectionError);
      if (error instanceof ConnectionError) {
        expect(error.reason).to.equal('auth');
        expect(error.message).to.equal(
          'Authentication failed (example.test:2222): All configured authentication methods failed'
        );
        expect(error.cause).to.be.instanceOf(Error);
      }
    });

    it('should resolve once the client is ready', async () => {
      const connect = sandbox.stub(NodeSSH.prototype, 'connect').resolves();

      await new RemoteExecutor(passwordParams).connect();

      expect(connect.calledOnce).to.equal(true);
      expect(connect.firstCall.args[0].password).to.equal('test-password');
    });
  });

  describe('classifyConnectError', () => {
    it('should classify handshake failures', () => {
      expect(
        classifyConnectError(
          sshError('connect ECONNREFUSED 10.0.0.5:22', { code: 'ECONNREFUSED' })
        )
      ).to.equal('network');
      expect(
        classifyConnectError(
          sshError('getaddrinfo ENOTFOUND nowhere', { level: 'client-dns' })
        )
      ).to.equal('network');
      expect(
        classifyConnectError(
          sshError('Timed out while waiting for handshake', {
            level: 'client-timeout',
          })
        )
      ).to.equal('timeout');
      expect(classifyConnectError(new Error('kex failed'))).to.equal(
        'unknown'
      );
      expect(classifyConnectError('not an error')).to.equal('unknown');
    });
  });

  describe('runCommand', () => {
    it('should collect raw output bytes and the exit status', async () => {
      sandbox.stub(NodeSSH.prototype, 'isConnected').returns(true);
      sandbox
        .stub(NodeSSH.prototype, 'execCommand')
        .callsFake(async (_command: string, options?: SSHExecCommandOptions) => {
          options?.onStdout?.(Buffer.from('hello\n'));
          options?.onStderr?.(Buffer.from('warning: x\n'));
          return { code: 3, signal: null, stdout: 'hello', stderr: 'warning: x' };
        });

      const output = await new RemoteExecutor(passwordParams).runCommand(
        'echo hello'
      );

      expect(output.exitStatus).to.equal(3);
      expect(output.stdout.toString()).to.equal('hello\n');
      expect(output.stderr.toString()).to.equal('warning: x\n');
    });

    it('should report a missing exit status as -1', async () => {
      sandbox.stub(NodeSSH.prototype, 'isConnected').returns(true);
      sandbox.stub(NodeSSH.prototype, 'execCommand').resolves({
        code: null,
        signal: 'KILL',
        stdout: '',
        stderr: '',
      });

      const output = await new RemoteExecutor(passwordParams).runCommand(
        'sleep 100'
      );

      expect(output.exitStatus).to.equal(-1);
      expect(output.stdout.length).to.equal(0);
    });

    it('should raise ChannelError when only the channel failed', async () => {
      sandbox.stub(NodeSSH.prototype, 'isConnected').returns(true);
      sandbox
        .stub(NodeSSH.prototype, 'execCommand')
        .rejects(new Error('Channel open failure: open failed'));

      const error = await captureError(() =>
        new RemoteExecutor(passwordParams).runCommand('ls')
      );

      expect(error).to.be.instanceOf(ChannelError);
      if (error instanceof ChannelError) {
        expect(error.command).to.equal('ls');
        expect(error.message).to.equal(
          "Error executing command 'ls': Channel open failure: open failed"
        );
      }
    });

    it('should raise ConnectionLostError on a reset socket', async () => {
      sandbox.stub(NodeSSH.prototype, 'isConnected').returns(true);
      sandbox
        .stub(NodeSSH.prototype, 'execCommand')
        .rejects(sshError('read ECONNRESET', { code: 'ECONNRESET' }));

      const error = await captureError(() =>
        new RemoteExecutor(passwordParams).runCommand('ls')
      );

      expect(error).to.be.instanceOf(ConnectionLostError);
    });

    it('should raise ConnectionLostError when the client dropped mid-command', async () => {
      const isConnected = sandbox.stub(NodeSSH.prototype, 'isConnected');
      isConnected.onFirstCall().returns(true);
      isConnected.returns(false);
      sandbox
        .stub(NodeSSH.prototype, 'execCommand')
        .rejects(new Error('No response from server'));

      const error = await captureError(() =>
        new RemoteExecutor(passwordParams).runCommand('ls')
      );

      expect(error).to.be.instanceOf(ConnectionLostError);
    });

    it('should raise ConnectionLostError when the channel closes on a dropped connection', async () => {
      let connected = true;
      sandbox.stub(NodeSSH.prototype, 'isConnected').callsFake(() => connected);
      sandbox.stub(NodeSSH.prototype, 'execCommand').callsFake(async () => {
        connected = false;
        return { code: null, signal: null, stdout: '', stderr: '' };
      });

      const error = await captureError(() =>
        new RemoteExecutor(passwordParams).runCommand('drop')
      );

      expect(error).to.be.instanceOf(ConnectionLostError);
      if (error instanceof ConnectionLostError) {
        expect(error.command).to.equal('drop');
        expect(error.message).to.equal(
          "Connection lost while executing 'drop': channel closed without an exit status"
        );
      }
    });

    it('should not open a channel without a connection', async () => {
      sandbox.stub(NodeSSH.prototype, 'isConnected').returns(false);
      const execCommand = sandbox.stub(NodeSSH.prototype, 'execCommand');

      const error = await captureError(() =>
        new RemoteExecutor(passwordParams).runCommand('ls')
      );

      expect(error).to.be.instanceOf(ConnectionLostError);
      expect(execCommand.called).to.equal(false);
    });

    it('should refuse to run after disconnect', async () => {
      sandbox.stub(NodeSSH.prototype, 'isConnected').returns(true);
      const dispose = sandbox.stub(NodeSSH.prototype, 'dispose');
      const executor = new RemoteExecutor(passwordParams);

      await executor.disconnect();
      const error = await captureError(() => executor.runCommand('ls'));

      expect(dispose.calledOnce).to.equal(true);
      expect(error).to.be.instanceOf(ConnectionLostError);
    });
  });
});
