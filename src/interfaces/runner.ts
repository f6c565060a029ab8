import { Logger } from '../lib/logger';
import { SessionFactory } from './remote-ssh';

export interface CommandRunnerOptions {
  /**
   * @description Pause between two commands in milliseconds.
   */
  commandDelayMs?: number;
  /**
   * @description Number of characters of stdout/stderr shown in log lines.
   */
  outputPreviewLength?: number;
  logger?: Logger;
  /**
   * @description Builds the session for a run. Defaults to a RemoteExecutor.
   */
  sessionFactory?: SessionFactory;
}
