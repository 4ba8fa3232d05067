// src/services/frameHandler.ts
// One inbound frame end to end: parse -> dispatch -> persist -> notify. Never throws.

import { tryParseMessage } from "../protocol/messageParser";
import { dispatchMessage, DispatchResult } from "../protocol/commandDispatcher";
import { describeError, StoreError } from "../protocol/errors";
import { CommandRecord, ParsedMessage, RecordListener, RecordStore } from "../protocol/types";

export interface FrameHandlerDeps {
  store: RecordStore;
  listeners?: RecordListener[];
  now?: () => Date;
}

export interface FrameOutcome {
  message: ParsedMessage | null;
  dispatch: DispatchResult | null;
  reply: string | null;
  savedIds: string[];
  storeErrors: StoreError[];
}

type SaveResult = { ok: true; id: string } | { ok: false; error: StoreError };

const emptyOutcome = (): FrameOutcome => ({
  message: null,
  dispatch: null,
  reply: null,
  savedIds: [],
  storeErrors: [],
});

export class FrameHandler {
  private store: RecordStore;
  private listeners: RecordListener[];
  private now: () => Date;

  constructor(deps: FrameHandlerDeps) {
    this.store = deps.store;
    this.listeners = deps.listeners ?? [];
    this.now = deps.now ?? (() => new Date());
  }

  addListener(listener: RecordListener): void {
    this.listeners.push(listener);
  }

  /**
   * Process a single raw frame. The reply (if any) is returned for the caller to
   * write back; a store failure never suppresses it.
   */
  async handle(raw: string): Promise<FrameOutcome> {
    const outcome = emptyOutcome();
    console.log(`📥 Received frame: ${raw}`);

    const parsed = tryParseMessage(raw);
    if (!parsed.ok) {
      console.warn(`❌ Failed to parse frame (${parsed.error.code}): ${parsed.error.message} | ${raw}`);
      return outcome;
    }

    const msg = parsed.message;
    outcome.message = msg;

    const result = dispatchMessage(msg, this.now());
    outcome.dispatch = result;
    outcome.reply = result.reply;

    for (const record of result.records) {
      const saved = await this.persist(record);
      if (!saved.ok) {
        outcome.storeErrors.push(saved.error);
        console.error(`❌ Failed to store ${record.kind} record for ${msg.deviceId}:`, saved.error.message);
        continue;
      }
      outcome.savedIds.push(saved.id);
      await this.notify({ ...record, id: saved.id });
    }

    if (result.reply) console.log(`📤 Reply for ${msg.deviceId}: ${result.reply}`);
    return outcome;
  }

  private async persist(record: CommandRecord): Promise<SaveResult> {
    try {
      const id = await this.store.save(record);
      console.log(`💾 Saved ${record.kind} record ${record.type} for ${record.deviceId} (id=${id})`);
      return { ok: true, id };
    } catch (err) {
      const error = err instanceof StoreError ? err : new StoreError(`Store rejected record: ${describeError(err)}`, err);
      return { ok: false, error };
    }
  }

  // Listener failures are logged and never reach the device
  private async notify(record: CommandRecord & { id: string }): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(record);
      } catch (err) {
        console.warn(`⚠️ Record listener failed (non-fatal): ${describeError(err)}`);
      }
    }
  }
}
