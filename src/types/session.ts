/**
 * Server-side record of one authenticated login
 *
 * `accountId` and `roleId` are set together or not at all.
 */
export interface Session {
  id: string;
  userId: string;
  webId: string;
  accountId?: string;
  roleId?: string;
  /**
   * Binding hash; the raw token is never stored
   */
  tokenHash: string;
  createdAt: Date;
  lastActivity: Date;
  expiresAt: Date;
}

/**
 * Session expires at `expiresAt`, inclusive
 */
export function isSessionExpired(session: Session, now: Date = new Date()): boolean {
  return now.getTime() >= session.expiresAt.getTime();
}

export function isSessionValid(session: Session, now: Date = new Date()): boolean {
  return (
    session.id !== '' &&
    session.userId !== '' &&
    session.webId !== '' &&
    session.tokenHash !== '' &&
    !isSessionExpired(session, now)
  );
}

export function hasAccountContext(
  session: Session
): session is Session & { accountId: string; roleId: string } {
  return Boolean(session.accountId && session.roleId);
}

/**
 * Seconds left before expiry (negative once expired)
 */
export function sessionTimeRemaining(session: Session, now: Date = new Date()): number {
  return (session.expiresAt.getTime() - now.getTime()) / 1000;
}
