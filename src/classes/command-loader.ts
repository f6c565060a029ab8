import { promises as fs } from 'fs';
import { CommandList } from '../interfaces';
import { NotFoundError } from '../lib/errors';
import { Logger, logger as defaultLogger } from '../lib/logger';

export class CommandLoader {
  constructor(private readonly logger: Logger = defaultLogger) {}

  /**
   * @description Splits command-file text into the commands to run.
   * Blank lines and lines starting with `#` are dropped; the rest are trimmed
   * and kept in file order.
   */
  static parse(text: string): CommandList {
    return Object.freeze(
      CommandLoader.entries(text).map((entry) => entry.command)
    );
  }

  private static entries(text: string): { line: number; command: string }[] {
    const entries: { line: number; command: string }[] = [];

    text
      .replace(/^\uFEFF/, '')
      .split(/\r?\n/)
      .forEach((raw, index) => {
        const command = raw.trim();
        if (command.length === 0 || command.startsWith('#')) return;
        entries.push({ line: index + 1, command });
      });

    return entries;
  }

  /**
   * @description Reads a UTF-8 command file.
   * @throws NotFoundError when the file is missing or unreadable.
   */
  async load(source: string): Promise<CommandList> {
    let text: string;
    try {
      text = await fs.readFile(source, 'utf8');
    } catch (error) {
      this.logger.error(`Commands file not found: ${source}`);
      throw new NotFoundError(source, { cause: error });
    }

    const entries = CommandLoader.entries(text);
    for (const { line, command } of entries) {
      this.logger.debug(`Loaded command ${line}: ${command}`);
    }

    this.logger.info(`Loaded ${entries.length} commands from ${source}`);
    return Object.freeze(entries.map((entry) => entry.command));
  }
}
