import { inspect } from 'util';
import { Credential } from './types';

/**
 * Holds the account identifier and secret. The secret never appears in logs or JSON.
 */
export class CredentialStore {
  private readonly credential: Credential;

  constructor(identifier: string, secret: string) {
    this.credential = Object.freeze({ identifier, secret });
  }

  public get(): Credential {
    return this.credential;
  }

  public toJSON(): { identifier: string; secret: string } {
    return { identifier: this.credential.identifier, secret: '***' };
  }

  [inspect.custom](): string {
    return `CredentialStore { identifier: '${this.credential.identifier}' }`;
  }
}
