import { Config, NodeSSH, SSHExecCommandResponse } from 'node-ssh';
import {
  CommandOutput,
  ConnectionParameters,
  TransportSession,
} from '../interfaces';
import {
  ChannelError,
  ConnectionError,
  ConnectionFailureReason,
  ConnectionLostError,
  describeError,
} from '../lib/errors';

const NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ECONNRESET',
]);

// Socket-level failures seen while a channel is open mean the transport is gone.
const CONNECTION_LOST_CODES = new Set(['ECONNRESET', 'EPIPE', 'ETIMEDOUT']);

function levelOf(error: unknown): string | undefined {
  if (error instanceof Error && 'level' in error) {
    return typeof error.level === 'string' ? error.level : undefined;
  }
  return undefined;
}

function codeOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Maps a failed handshake to the reason reported to the user
 */
export function classifyConnectError(error: unknown): ConnectionFailureReason {
  const level = levelOf(error);
  const code = codeOf(error);

  if (level === 'client-authentication') return 'auth';
  if (
    level === 'client-timeout' ||
    code === 'ETIMEDOUT' ||
    /timed out/i.test(describeError(error))
  ) {
    return 'timeout';
  }
  if (
    level === 'client-socket' ||
    level === 'client-dns' ||
    (code !== undefined && NETWORK_CODES.has(code))
  ) {
    return 'network';
  }
  return 'unknown';
}

const REASON_MESSAGES: Record<ConnectionFailureReason, string> = {
  auth: 'Authentication failed',
  network: 'Unable to connect',
  timeout: 'Connection timed out',
  unknown: 'SSH connection error',
};

export class RemoteExecutor implements TransportSession {
  private ssh: NodeSSH;
  private params: ConnectionParameters;
  private closed = false;

  constructor(params: ConnectionParameters) {
    this.ssh = new NodeSSH();
    this.params = params;
  }

  /**
   * Build the node-ssh configuration for the active credential
   */
  buildConfig(): Config {
    const { host, port, username, credential, readyTimeout } = this.params;
    const config: Config = { host, port, username };

    if (readyTimeout !== undefined) {
      config.readyTimeout = readyTimeout;
    }

    if (credential.kind === 'key') {
      config.privateKeyPath = credential.keyPath;
      if (credential.passphrase) {
        config.passphrase = credential.passphrase;
      }
    } else {
      config.password = credential.password;
    }

    return config;
  }

  /**
   * Connect to the remote server
   */
  async connect(): Promise<void> {
    const { host, port } = this.params;

    try {
      await this.ssh.connect(this.buildConfig());
    } catch (error) {
      const reason = classifyConnectError(error);
      throw new ConnectionError(
        `${REASON_MESSAGES[reason]} (${host}:${port}): ${describeError(error)}`,
        reason,
        { cause: error }
      );
    }

    this.closed = false;
    this.ssh.connection?.once('close', () => {
      this.closed = true;
    });
  }

  /**
   * Disconnect from the remote server
   */
  async disconnect(): Promise<void> {
    try {
      this.ssh.dispose();
    } catch (error) {
      throw new Error(`Failed to disconnect from remote server: ${error}`);
    } finally {
      this.closed = true;
    }
  }

  /**
   * Run one command over a fresh exec channel and wait for it to close
   */
  async runCommand(command: string): Promise<CommandOutput> {
    if (this.closed || !this.ssh.isConnected()) {
      throw new ConnectionLostError('SSH connection not established', command);
    }

    const startTime = Date.now();
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let result: SSHExecCommandResponse;

    try {
      result = await this.ssh.execCommand(command, {
        onStdout: (chunk) => stdout.push(chunk),
        onStderr: (chunk) => stderr.push(chunk),
      });
    } catch (error) {
      if (this.isConnectionGone(error)) {
        throw new ConnectionLostError(
          `Connection lost while executing '${command}': ${describeError(error)}`,
          command,
          { cause: error }
        );
      }
      throw new ChannelError(
        `Error executing command '${command}': ${describeError(error)}`,
        command,
        { cause: error }
      );
    }

    // node-ssh resolves on channel close, so a dropped transport shows up as a
    // missing exit status rather than a rejection.
    if (result.code === null && this.isConnectionGone(undefined)) {
      throw new ConnectionLostError(
        `Connection lost while executing '${command}': channel closed without an exit status`,
        command
      );
    }

    return {
      // no exit status (killed by a signal) is reported as -1
      exitStatus: result.code ?? -1,
      stdout: collect(stdout, result.stdout),
      stderr: collect(stderr, result.stderr),
      duration: Date.now() - startTime,
    };
  }

  private isConnectionGone(error: unknown): boolean {
    const code = codeOf(error);
    return (
      this.closed ||
      !this.ssh.isConnected() ||
      (code !== undefined && CONNECTION_LOST_CODES.has(code))
    );
  }
}

// Raw chunks keep the bytes as sent; node-ssh's own strings are trimmed.
function collect(chunks: Buffer[], fallback: string): Buffer {
  return chunks.length > 0 ? Buffer.concat(chunks) : Buffer.from(fallback);
}
