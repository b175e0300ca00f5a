/**
 * @acct-emulator/accounting — Receipt service.
 *
 * Upload sequence:
 * 1. Write the bytes to `<uploadDir>/<companyId>/.upload-<random>`
 * 2. Commit the receipt record (this allocates the id)
 * 3. Rename the file to `<uploadDir>/<companyId>/<id>.pdf`
 * 4. Commit the final `file_path`
 *
 * A failure after step 1 removes the staged file; a failure after
 * step 2 also removes the record. No file ever sits under a guessable
 * name without a record pointing at it.
 *
 * Deleting a receipt removes the record first; the file is then
 * removed best-effort and a failure is only logged.
 */

import { randomBytes } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { KvStore } from "@acct-emulator/store";
import type { Logger } from "pino";
import { RECEIPTS } from "./collections.js";
import type { CompanyFilter, CreateReceiptInput, Receipt } from "./types.js";
import { AccountingError } from "./types.js";

export const DEFAULT_RECEIPT_MIME_TYPE = "application/octet-stream";

export interface ReceiptServiceOptions {
  readonly uploadDir: string;
  readonly logger: Logger;
  readonly now?: (() => Date) | undefined;
}

export class ReceiptService {
  private readonly _store: KvStore;
  private readonly _uploadDir: string;
  private readonly _logger: Logger;
  private readonly _now: () => Date;

  constructor(store: KvStore, options: ReceiptServiceOptions) {
    this._store = store;
    this._uploadDir = options.uploadDir;
    this._logger = options.logger;
    this._now = options.now ?? (() => new Date());
  }

  list(filter: CompanyFilter = {}): Receipt[] {
    return this._store.scan(
      RECEIPTS,
      (receipt) => filter.company_id === undefined || receipt.company_id === filter.company_id,
    );
  }

  get(id: number): Receipt {
    const receipt = this._store.find(RECEIPTS, id);
    if (receipt === undefined) {
      throw new AccountingError("NOT_FOUND", "Receipt not found");
    }
    return receipt;
  }

  async create(input: CreateReceiptInput): Promise<Receipt> {
    const companyDir = join(this._uploadDir, String(input.company_id));
    await mkdir(companyDir, { recursive: true });

    const stagedPath = join(companyDir, `.upload-${randomBytes(16).toString("hex")}`);
    await writeFile(stagedPath, input.file.data, { flag: "wx" });

    let receipt: Receipt;
    try {
      const now = this._now().toISOString();
      receipt = this._store.update((tx) => {
        const record: Receipt = {
          id: tx.nextID(RECEIPTS),
          company_id: input.company_id,
          issue_date: input.issue_date,
          description: input.description ?? "",
          status: "unconfirmed",
          file_name: input.file.name,
          file_path: "",
          mime_type: input.file.type.length > 0 ? input.file.type : DEFAULT_RECEIPT_MIME_TYPE,
          file_size: input.file.data.byteLength,
          created_at: now,
          updated_at: now,
        };
        tx.put(RECEIPTS, record.id, record);
        return record;
      });
    } catch (err) {
      await this._removeFile(stagedPath);
      throw err;
    }

    const finalPath = join(companyDir, `${receipt.id}.pdf`);
    try {
      await rename(stagedPath, finalPath);
    } catch (err) {
      await this._removeFile(stagedPath);
      this._store.delete(RECEIPTS, receipt.id);
      throw err;
    }

    const stored: Receipt = { ...receipt, file_path: finalPath };
    this._store.put(RECEIPTS, stored.id, stored);
    return stored;
  }

  async delete(id: number): Promise<void> {
    const receipt = this._store.update((tx) => {
      const current = tx.find(RECEIPTS, id);
      if (current === undefined) {
        throw new AccountingError("NOT_FOUND", "Receipt not found");
      }
      tx.delete(RECEIPTS, id);
      return current;
    });

    if (receipt.file_path.length > 0) {
      await this._removeFile(receipt.file_path);
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /** Best-effort removal; a missing file is fine, other failures are logged. */
  private async _removeFile(filePath: string): Promise<void> {
    try {
      await rm(filePath, { force: true });
    } catch (err) {
      this._logger.warn({ err, filePath }, "Failed to remove receipt file");
    }
  }
}
