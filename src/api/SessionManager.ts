import { Logger } from 'homebridge';
import {
  AuthenticationDetails,
  CognitoRefreshToken,
  CognitoUser,
  CognitoUserPool,
  CognitoUserSession,
} from 'amazon-cognito-identity-js';
import { COGNITO_CLIENT_ID, COGNITO_USER_POOL_ID, SESSION_MIN_MARGIN_MS } from './constants';
import { CredentialStore } from './CredentialStore';
import { AuthError, AuthErrorKind } from './errors';
import { Credential, Session } from './types';

export interface SessionManagerOptions {
  /** How long before `expiresAt` a session stops counting as valid. */
  marginMs?: number;
  userPoolId?: string;
  clientId?: string;
  now?: () => number;
}

const INVALID_CREDENTIAL_CODES = new Set([
  'NotAuthorizedException',
  'UserNotFoundException',
  'UserNotConfirmedException',
  'PasswordResetRequiredException',
]);

const THROTTLED_CODES = new Set([
  'TooManyRequestsException',
  'LimitExceededException',
  'TooManyFailedAttemptsException',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) {
    return undefined;
  }
  if ('code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return 'name' in err && typeof err.name === 'string' ? err.name : undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function classifyCognitoError(err: unknown): AuthErrorKind {
  const code = errorCode(err);
  if (code && INVALID_CREDENTIAL_CODES.has(code)) {
    return 'InvalidCredential';
  }
  if (code && THROTTLED_CODES.has(code)) {
    return 'Throttled';
  }
  return 'ProviderUnavailable';
}

/**
 * Owns the credential and the current token set. Sessions are replaced on renewal, never mutated.
 */
export class SessionManager {
  private readonly pool: CognitoUserPool;
  private readonly marginMs: number;
  private readonly now: () => number;
  private user?: CognitoUser;

  constructor(
    private readonly credentials: CredentialStore,
    private readonly log: Logger,
    options: SessionManagerOptions = {},
  ) {
    this.marginMs = Math.max(options.marginMs ?? SESSION_MIN_MARGIN_MS, 0);
    this.now = options.now ?? Date.now;
    this.pool = new CognitoUserPool({
      UserPoolId: options.userPoolId ?? COGNITO_USER_POOL_ID,
      ClientId: options.clientId ?? COGNITO_CLIENT_ID,
    });
  }

  public get margin(): number {
    return this.marginMs;
  }

  public isValid(session: Session): boolean {
    return this.now() < session.expiresAt - this.marginMs;
  }

  private cognitoUser(identifier: string): CognitoUser {
    if (!this.user || this.user.getUsername() !== identifier) {
      this.user = new CognitoUser({ Username: identifier, Pool: this.pool });
      this.user.setAuthenticationFlowType('USER_PASSWORD_AUTH');
    }
    return this.user;
  }

  private toSession(cognito: CognitoUserSession, previous?: Session): Session {
    const access = cognito.getAccessToken();
    const refreshToken = cognito.getRefreshToken()?.getToken() || previous?.refreshToken;
    if (!refreshToken) {
      throw new AuthError('ProviderUnavailable', 'Identity provider returned no refresh token.');
    }
    return Object.freeze({
      accessToken: access.getJwtToken(),
      idToken: cognito.getIdToken().getJwtToken(),
      refreshToken,
      issuedAt: access.getIssuedAt() * 1000,
      expiresAt: access.getExpiration() * 1000,
    });
  }

  public authenticate(credential: Credential = this.credentials.get()): Promise<Session> {
    const user = this.cognitoUser(credential.identifier);
    const details = new AuthenticationDetails({
      Username: credential.identifier,
      Password: credential.secret,
    });

    return new Promise<Session>((resolve, reject) => {
      const challenge = (name: string) => () => {
        this.log.error(`Cognito requested an unsupported ${name} challenge.`);
        reject(new AuthError('InvalidCredential', `Account requires ${name}, which is not supported.`));
      };

      user.authenticateUser(details, {
        onSuccess: (cognitoSession) => {
          try {
            const session = this.toSession(cognitoSession);
            this.log.debug('Cognito authentication successful.');
            resolve(session);
          } catch (err) {
            reject(err);
          }
        },
        onFailure: (err: unknown) => {
          const kind = classifyCognitoError(err);
          this.log.error(`Cognito authentication failed (${kind}):`, errorMessage(err));
          reject(new AuthError(kind, errorMessage(err), err));
        },
        newPasswordRequired: challenge('new password'),
        mfaRequired: challenge('MFA'),
        totpRequired: challenge('TOTP'),
        customChallenge: challenge('custom'),
      });
    });
  }

  private refresh(session: Session): Promise<Session> {
    const user = this.cognitoUser(this.credentials.get().identifier);
    const token = new CognitoRefreshToken({ RefreshToken: session.refreshToken });

    return new Promise<Session>((resolve, reject) => {
      user.refreshSession(token, (err: unknown, cognitoSession: CognitoUserSession | null) => {
        if (err || !cognitoSession) {
          return reject(err ?? new Error('Refresh returned no session.'));
        }
        try {
          resolve(this.toSession(cognitoSession, session));
        } catch (mapErr) {
          reject(mapErr);
        }
      });
    });
  }

  /**
   * Renews with the refresh token, falling back to a full login.
   * Throws `RefreshRejected` when both fail.
   */
  public async forceRenew(session: Session): Promise<Session> {
    try {
      const renewed = await this.refresh(session);
      this.log.info('Session renewed.');
      return renewed;
    } catch (refreshError) {
      this.log.warn('Session renewal rejected, re-authenticating:', errorMessage(refreshError));
    }

    try {
      return await this.authenticate();
    } catch (authError) {
      throw new AuthError('RefreshRejected', 'Session renewal and re-authentication both failed.', authError);
    }
  }

  public async ensureValid(session?: Session): Promise<Session> {
    if (!session) {
      return this.authenticate();
    }
    if (this.isValid(session)) {
      return session;
    }
    this.log.debug(`Session expires at ${new Date(session.expiresAt).toISOString()}, renewing.`);
    return this.forceRenew(session);
  }
}
