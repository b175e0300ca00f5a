/**
 * EmulatorService — Composition root for all domain packages.
 *
 * Owns the store and builds the token manager, authorization flow,
 * reference catalog and accounting services on top of it. Route
 * handlers reach everything through this object.
 */

import type { Logger } from "pino";
import { InMemoryKvStore, openStore } from "@acct-emulator/store";
import type { KvStore } from "@acct-emulator/store";
import {
  AuthorizationFlow,
  OAUTH_COLLECTIONS,
  TokenManager,
} from "@acct-emulator/oauth";
import type { LoginCredentials } from "@acct-emulator/oauth";
import {
  ACCOUNTING_COLLECTIONS,
  DealService,
  JournalService,
  ReceiptService,
  ReferenceCatalog,
  WalletTxnService,
} from "@acct-emulator/accounting";

// =============================================================================
// Configuration
// =============================================================================

export interface EmulatorServiceConfig {
  /** JSONL database file; omitted → in-memory store */
  readonly dbPath?: string | undefined;
  readonly uploadDir: string;
  readonly logger: Logger;
  /** Reference data JSON; omitted → the bundled seed data */
  readonly referenceDataPath?: string | undefined;
  readonly accessTokenTtlSeconds?: number | undefined;
  readonly refreshTokenTtlSeconds?: number | undefined;
  readonly sessionTtlSeconds?: number | undefined;
  readonly credentials?: LoginCredentials | undefined;
  /** Company id returned by the token endpoint */
  readonly companyId?: number | undefined;
  readonly settleWithoutPayments?: boolean | undefined;
  readonly now?: (() => Date) | undefined;
}

export interface PurgeResult {
  readonly tokens: number;
  readonly sessions: number;
}

export const STORE_COLLECTIONS = [...OAUTH_COLLECTIONS, ...ACCOUNTING_COLLECTIONS] as const;

// =============================================================================
// Service
// =============================================================================

export class EmulatorService {
  readonly store: KvStore;
  readonly companyId: number;
  readonly catalog: ReferenceCatalog;
  readonly tokens: TokenManager;
  readonly authorization: AuthorizationFlow;
  readonly walletTxns: WalletTxnService;
  readonly deals: DealService;
  readonly journals: JournalService;
  readonly receipts: ReceiptService;

  private readonly _logger: Logger;

  constructor(store: KvStore, config: EmulatorServiceConfig) {
    const now = config.now;
    this.store = store;
    this.companyId = config.companyId ?? 1;
    this._logger = config.logger;
    this.catalog =
      config.referenceDataPath === undefined
        ? ReferenceCatalog.load()
        : ReferenceCatalog.load(config.referenceDataPath);

    this.tokens = new TokenManager(store, {
      accessTokenTtlSeconds: config.accessTokenTtlSeconds,
      refreshTokenTtlSeconds: config.refreshTokenTtlSeconds,
      now,
    });
    this.authorization = new AuthorizationFlow(store, {
      credentials: config.credentials,
      sessionTtlSeconds: config.sessionTtlSeconds,
      now,
    });
    this.walletTxns = new WalletTxnService(store, now);
    this.deals = new DealService(store, {
      catalog: this.catalog,
      logger: config.logger.child({ component: "deals" }),
      settleWithoutPayments: config.settleWithoutPayments,
      now,
    });
    this.journals = new JournalService(store, this.catalog, now);
    this.receipts = new ReceiptService(store, {
      uploadDir: config.uploadDir,
      logger: config.logger.child({ component: "receipts" }),
      now,
    });
  }

  /**
   * Open the configured store (file-backed when `dbPath` is set) and
   * build the services on it.
   *
   * @throws StoreError IO_ERROR when the database file cannot be read
   */
  static open(config: EmulatorServiceConfig): EmulatorService {
    const store =
      config.dbPath === undefined
        ? new InMemoryKvStore({ collections: STORE_COLLECTIONS })
        : openStore({ filePath: config.dbPath, collections: STORE_COLLECTIONS });
    return new EmulatorService(store, config);
  }

  /** Drop expired tokens and authorization sessions. */
  purgeExpired(): PurgeResult {
    const result: PurgeResult = {
      tokens: this.tokens.purgeExpired(),
      sessions: this.authorization.purgeExpired(),
    };
    this._logger.info(result, "Expired credentials purged");
    return result;
  }

  close(): void {
    if (!this.store.closed) {
      this.store.close();
    }
  }
}
