import { password as passwordPrompt } from '@inquirer/prompts';
import { Credential } from '../interfaces';
import { ValidationError, sanitizeSSHKeyPath } from './sanitization';

export interface CredentialInput {
  password?: string;
  keyPath?: string;
  passphrase?: string;
}

export type PasswordPrompt = (message: string) => Promise<string>;

export const promptForPassword: PasswordPrompt = (message) =>
  passwordPrompt({ message, mask: '*' });

/**
 * @description Picks the single credential used for the session.
 * An empty password with a key path selects key authentication; any other
 * combination is password authentication, prompting when no password was given.
 */
export async function resolveCredential(
  input: CredentialInput,
  target: { username: string; host: string },
  prompt: PasswordPrompt = promptForPassword
): Promise<Credential> {
  const password = input.password ?? '';
  const keyPath = input.keyPath?.trim() ?? '';

  if (!password && keyPath) {
    const credential: Extract<Credential, { kind: 'key' }> = {
      kind: 'key',
      keyPath: sanitizeSSHKeyPath(keyPath),
    };
    if (input.passphrase) {
      credential.passphrase = input.passphrase;
    }
    return credential;
  }

  if (password) {
    return { kind: 'password', password };
  }

  const entered = await prompt(
    `Password for ${target.username}@${target.host}:`
  );
  if (!entered) {
    throw new ValidationError(
      'No authentication method provided (password or key)'
    );
  }

  return { kind: 'password', password: entered };
}
