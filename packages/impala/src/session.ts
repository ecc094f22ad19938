/**
 * @lakehouse/impala - Session Manager
 *
 * Opens and closes the server session and holds the default query options
 * the server reported for it.
 */

import type { QueryOptionLevel } from '@lakehouse/impala-rpc';

import { retryDelaySeconds } from './dispatcher.js';
import type { RpcDispatcher } from './dispatcher.js';
import {
  MissingServerMethodError,
  QueryCancelledError,
  QueryStateError,
  RpcApplicationError,
  RpcServerError,
} from './errors.js';
import type { Logger } from './logger.js';
import type { PingResult } from './types.js';
import type { ProtocolAdapter, QueryOption, StatementRunner } from './adapters/types.js';

/**
 * Options are keyed by upper-cased name
 */
export class Session {
  readonly defaultOptions = new Map<string, string>();
  readonly optionLevels = new Map<string, QueryOptionLevel>();

  constructor(
    /** Rendered session id; null where the connection is the session */
    readonly id: string | null
  ) {}

  getDefaultOption(name: string): string | undefined {
    return this.defaultOptions.get(name.toUpperCase());
  }

  getOptionLevel(name: string): QueryOptionLevel | undefined {
    return this.optionLevels.get(name.toUpperCase());
  }

  /** Replace the stored options */
  setOptions(options: readonly QueryOption[]): void {
    this.defaultOptions.clear();
    this.optionLevels.clear();
    for (const option of options) {
      const key = option.name.toUpperCase();
      this.defaultOptions.set(key, option.value);
      if (option.level !== null) {
        this.optionLevels.set(key, option.level);
      }
    }
  }
}

/**
 * Errors after which listing options is abandoned and the session goes on
 * without defaults
 */
function isUnsupportedListing(error: unknown): boolean {
  return error instanceof MissingServerMethodError || error instanceof RpcServerError || error instanceof QueryStateError;
}

export interface SessionManagerOptions {
  adapter: ProtocolAdapter;
  dispatcher: RpcDispatcher;
  logger: Logger;
  /** Runs the option listing statement through the engine */
  runStatement: StatementRunner;
}

export class SessionManager {
  private current: Session | undefined;
  private webserver: string | null = null;

  constructor(private readonly options: SessionManagerOptions) {
    options.dispatcher.setSessionIdSource(() => this.current?.id ?? null);
  }

  get session(): Session | undefined {
    return this.current;
  }

  /** Debug web UI address from the last ping */
  get webserverAddress(): string | null {
    return this.webserver;
  }

  async open(user: string | undefined): Promise<Session> {
    const info = await this.options.adapter.openSession(user);
    const session = new Session(info.sessionId);
    this.current = session;
    session.setOptions(await this.loadDefaultOptions());
    return session;
  }

  /**
   * List the server's default options. The listing is retried as a whole
   * while attempts remain.
   */
  private async loadDefaultOptions(): Promise<QueryOption[]> {
    const { adapter, dispatcher, logger, runStatement } = this.options;
    const maxTries = dispatcher.effectiveMaxTries;

    for (let attempt = 1; ; attempt++) {
      try {
        return await adapter.defaultOptions(runStatement);
      } catch (error) {
        if (isUnsupportedListing(error)) {
          logger.logException('Warning', 'could not list query options, continuing without defaults.', error);
          return [];
        }
        if (error instanceof RpcApplicationError || error instanceof QueryCancelledError) {
          throw error;
        }
        const remaining = maxTries - attempt;
        const retryNote = maxTries > 1 ? ` Num remaining tries: ${remaining}` : '';
        logger.logException(
          'Exception',
          `type=${error instanceof Error ? error.name : typeof error} when listing query options.${retryNote}`,
          error
        );
        if (remaining <= 0) {
          throw error;
        }
      }
      await dispatcher.pause(retryDelaySeconds(attempt + 1, dispatcher.minRetrySleepSeconds));
    }
  }

  /**
   * Liveness check; remembers the web UI address for debug links
   */
  async ping(): Promise<PingResult> {
    const result = await this.options.adapter.ping();
    this.webserver = result.webserverAddress;
    return result;
  }

  /**
   * Close the session (best effort) and the transport
   */
  async close(): Promise<void> {
    const { adapter, dispatcher, logger } = this.options;
    if (this.current) {
      try {
        await adapter.closeSession();
      } catch (error) {
        logger.logException(
          'Warning',
          `close session RPC failed: ${error instanceof Error ? error.name : typeof error}`,
          error
        );
      }
      this.current = undefined;
    }
    await dispatcher.transport.close();
  }
}
