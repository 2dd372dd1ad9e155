import type { UserToken } from '../models/print-content.model';
import { logger } from '../utils/logger';

/** Performs the device binding request and yields the issued token */
export type DeviceBinder = () => Promise<UserToken>;

/**
 * Owns the user token for one printer client. The token is resolved lazily,
 * reused until a request reports it rejected, and concurrent resolutions while
 * unresolved share a single binding request.
 */
export class SessionAuthenticator {
  private token: UserToken | null = null;
  private pending: Promise<UserToken> | null = null;

  constructor(private readonly bind: DeviceBinder) {}

  resolveToken(): Promise<UserToken> {
    if (this.token !== null) {
      return Promise.resolve(this.token);
    }
    if (this.pending) {
      return this.pending;
    }

    logger.debug('Resolving user token');
    const pending: Promise<UserToken> = this.bind()
      .then((token) => {
        this.token = token;
        return token;
      })
      .finally(() => {
        if (this.pending === pending) {
          this.pending = null;
        }
      });
    this.pending = pending;
    return pending;
  }

  /**
   * Drop the cached token. When the rejected token is given, a token resolved
   * since then by a concurrent caller is kept.
   */
  invalidate(rejected?: UserToken): void {
    if (rejected !== undefined && rejected !== this.token) {
      return;
    }
    if (this.token !== null) {
      logger.info('User token invalidated');
    }
    this.token = null;
  }

  get isResolved(): boolean {
    return this.token !== null;
  }
}
