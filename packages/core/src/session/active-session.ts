import { pino } from 'pino';
import { ConnectionError, errorMessage } from '../errors/index.js';
import type { NetworkConnector } from '../ports.js';
import type { NetworkConnection, SigningIdentity } from '../types.js';

const logger = pino({ name: 'active-session', level: process.env.LOG_LEVEL || 'info' });

export interface SessionSnapshot {
  readonly identity?: SigningIdentity;
  readonly connection?: NetworkConnection;
}

// Runs queued tasks one at a time; a failed task does not block the next one.
class SessionLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * Process-wide signing identity and network connection.
 *
 * Mutations and workflow spans share one lock, so a deployment that started
 * with one identity finishes with it even if another request switches
 * accounts meanwhile. Tasks passed to `runExclusive` must not call the
 * mutating methods of the same session.
 */
export class ActiveSession {
  private identity?: SigningIdentity;
  private connection?: NetworkConnection;
  private readonly lock = new SessionLock();

  constructor(private readonly connector: NetworkConnector) {}

  getIdentity(): SigningIdentity | undefined {
    return this.identity;
  }

  getConnection(): NetworkConnection | undefined {
    return this.connection;
  }

  networks(): string[] {
    return this.connector.networks();
  }

  setIdentity(identity: SigningIdentity): Promise<void> {
    return this.lock.run(async () => {
      this.identity = identity;
      logger.info({ account: identity.name, address: identity.address }, 'Active account changed');
    });
  }

  clearIdentity(): Promise<void> {
    return this.lock.run(async () => {
      this.identity = undefined;
    });
  }

  /**
   * Tears down the current connection before connecting to `name`. On
   * failure the session is left without a connection.
   */
  setConnection(name: string): Promise<NetworkConnection> {
    return this.lock.run(async () => {
      await this.teardown();

      try {
        const connection = await this.connector.connect(name);
        this.connection = connection;
        logger.info({ network: name, chainId: connection.chainId }, 'Connected to network');
        return connection;
      } catch (error) {
        if (error instanceof ConnectionError) {
          throw error;
        }
        throw new ConnectionError(name, { reason: errorMessage(error), cause: error });
      }
    });
  }

  disconnect(): Promise<void> {
    return this.lock.run(() => this.teardown());
  }

  runExclusive<T>(task: (snapshot: SessionSnapshot) => Promise<T>): Promise<T> {
    return this.lock.run(() => task({ identity: this.identity, connection: this.connection }));
  }

  private async teardown(): Promise<void> {
    const current = this.connection;
    if (!current) {
      return;
    }

    this.connection = undefined;
    try {
      await this.connector.disconnect(current);
      logger.info({ network: current.name }, 'Disconnected from network');
    } catch (error) {
      logger.warn({ network: current.name, error: errorMessage(error) }, 'Network teardown failed');
    }
  }
}
