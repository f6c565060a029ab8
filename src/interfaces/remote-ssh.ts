export type Credential =
  | { kind: 'password'; password: string }
  | { kind: 'key'; keyPath: string; passphrase?: string };

export interface ConnectionParameters {
  host: string;
  port: number; // default 22
  username: string;

  // exactly one credential form is active
  credential: Credential;
  readyTimeout?: number;
}

export interface CommandOutput {
  exitStatus: number;
  stdout: Buffer;
  stderr: Buffer;
  duration: number;
}

/**
 * @description A live SSH session able to run one command at a time.
 */
export interface TransportSession {
  connect(): Promise<void>;
  runCommand(command: string): Promise<CommandOutput>;
  disconnect(): Promise<void>;
}

export type SessionFactory = (params: ConnectionParameters) => TransportSession;
