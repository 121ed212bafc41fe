import { ValidationError } from '@fastapp/protocol';

/**
 * The few session operations the registry needs, so it can be driven by the
 * MongoDB driver in production and by a fake in tests.
 */
export interface SessionDriver<TSession> {
  start(): TSession;
  begin(session: TSession): void;
  commit(session: TSession): Promise<void>;
  abort(session: TSession): Promise<void>;
  end(session: TSession): Promise<void>;
}

/**
 * Open transactions keyed by caller-chosen id.
 *
 * Each id owns one session from prepare until commit or rollback. Sessions
 * are always ended, even when commit or abort throws.
 */
export class SessionRegistry<TSession> {
  private readonly open = new Map<string, TSession>();

  constructor(private readonly driver: SessionDriver<TSession>) {}

  get size(): number {
    return this.open.size;
  }

  has(transactionId: string): boolean {
    return this.open.has(transactionId);
  }

  /**
   * Start a session and begin a transaction on it.
   * @throws ValidationError if the id is empty or already open
   */
  async prepare(transactionId: string): Promise<TSession> {
    if (transactionId.length === 0) {
      throw new ValidationError('Transaction id must be a non-empty string', {
        field: 'transactionId',
      });
    }
    if (this.open.has(transactionId)) {
      throw new ValidationError(`Transaction already open: ${transactionId}`, {
        field: 'transactionId',
      });
    }

    const session = this.driver.start();
    try {
      this.driver.begin(session);
    } catch (error) {
      await this.driver.end(session);
      throw error;
    }
    this.open.set(transactionId, session);
    return session;
  }

  /**
   * Session of an open transaction.
   * @throws ValidationError if no transaction is open under the id
   */
  get(transactionId: string): TSession {
    const session = this.open.get(transactionId);
    if (session === undefined) {
      throw new ValidationError(`No open transaction: ${transactionId}`, {
        field: 'transactionId',
      });
    }
    return session;
  }

  async commit(transactionId: string): Promise<boolean> {
    return this.finish(transactionId, (session) => this.driver.commit(session));
  }

  async rollback(transactionId: string): Promise<boolean> {
    return this.finish(transactionId, (session) => this.driver.abort(session));
  }

  /**
   * Roll back every open transaction. Used on shutdown.
   * @returns Ids that were rolled back
   */
  async rollbackAll(): Promise<string[]> {
    const ids = Array.from(this.open.keys());
    const results = await Promise.allSettled(ids.map((id) => this.rollback(id)));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failed) {
      throw failed.reason;
    }
    return ids;
  }

  private async finish(
    transactionId: string,
    settle: (session: TSession) => Promise<void>
  ): Promise<boolean> {
    const session = this.open.get(transactionId);
    if (session === undefined) {
      return false;
    }

    // Removed first so the id can be reused even if settling fails
    this.open.delete(transactionId);
    try {
      await settle(session);
    } finally {
      await this.driver.end(session);
    }
    return true;
  }
}
