/**
 * Trackwise: Hash-Chained Telemetry Log
 *
 * Append-only JSONL record of every handled prompt. Each entry carries the
 * SHA-256 hash of its own fields and of the previous entry, so edits and
 * deletions are detectable.
 *
 * Hash Formula:
 * hash = SHA256(JSON.stringify([sequence, timestamp, request_id, prompt,
 *                               capability, output, outcome, cached, prev_hash]))
 *
 * @module audit/telemetry-sink
 * @version 1.0.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import * as readline from 'node:readline';
import {
  type TelemetryEntry,
  type TelemetryEvent,
  type TelemetryOutcome,
  type Result,
  TelemetryEntrySchema,
  ok,
  err,
} from '../types/index.js';
import type { EventBus } from '../kernel/event-bus.js';
import { formatError, telemetryLogger } from '../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const GENESIS_HASH = '0'.repeat(64);

// ═══════════════════════════════════════════════════════════════════════════
// HASH COMPUTATION
// ═══════════════════════════════════════════════════════════════════════════

function computeHash(entry: Omit<TelemetryEntry, 'hash'>): string {
  const data = JSON.stringify([
    entry.sequence,
    entry.timestamp,
    entry.request_id,
    entry.prompt,
    entry.capability,
    entry.output,
    entry.outcome,
    entry.cached,
    entry.prev_hash,
  ]);
  return crypto.createHash('sha256').update(data).digest('hex');
}

function parseEntry(line: string): TelemetryEntry {
  return TelemetryEntrySchema.parse(JSON.parse(line));
}

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Where the orchestrator sends one event per request. `record` never
 * rejects; failures go to the operational log.
 */
export interface TelemetrySink {
  record(event: TelemetryEvent): Promise<void>;
}

export interface TelemetryQueryOptions {
  outcome?: TelemetryOutcome;
  since?: string;
  until?: string;
  limit?: number;
  offset?: number;
}

export interface VerificationResult {
  valid: boolean;
  entriesChecked: number;
  firstInvalidSequence?: number;
  error?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// JSONL SINK
// ═══════════════════════════════════════════════════════════════════════════

export class JsonlTelemetrySink implements TelemetrySink {
  private readonly filePath: string;
  private readonly eventBus?: EventBus;
  private sequence: number = -1;
  private lastHash: string = GENESIS_HASH;
  private initialized: boolean = false;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string, eventBus?: EventBus) {
    this.filePath = filePath;
    this.eventBus = eventBus;
  }

  async initialize(): Promise<Result<void, Error>> {
    if (this.initialized) {
      return ok(undefined);
    }

    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });

      if (!fs.existsSync(this.filePath)) {
        await fs.promises.writeFile(this.filePath, '', { mode: 0o600 });
      }

      const lastEntry = await this.getLastEntry();
      if (lastEntry !== null) {
        this.sequence = lastEntry.sequence;
        this.lastHash = lastEntry.hash;
      }

      this.initialized = true;
      return ok(undefined);
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  /**
   * Record an event. Never rejects.
   */
  async record(event: TelemetryEvent): Promise<void> {
    const result = await this.append(event);
    if (!result.success) {
      telemetryLogger.error(
        { err: formatError(result.error), requestId: event.request_id },
        'Failed to record telemetry event'
      );
      this.eventBus?.emit('telemetry:failed', {
        outcome: event.outcome,
        error: result.error.message,
        timestamp: new Date(),
      });
    }
  }

  async append(event: TelemetryEvent): Promise<Result<TelemetryEntry, Error>> {
    if (!this.initialized) {
      const initResult = await this.initialize();
      if (!initResult.success) {
        return err(initResult.error);
      }
    }

    return new Promise((resolve) => {
      this.writeQueue = this.writeQueue.then(async () => {
        try {
          const entryWithoutHash: Omit<TelemetryEntry, 'hash'> = {
            ...event,
            sequence: this.sequence + 1,
            prev_hash: this.lastHash,
          };

          const hash = computeHash(entryWithoutHash);
          const entry: TelemetryEntry = { ...entryWithoutHash, hash };

          await fs.promises.appendFile(this.filePath, JSON.stringify(entry) + '\n', {
            encoding: 'utf-8',
          });

          this.sequence = entry.sequence;
          this.lastHash = hash;

          telemetryLogger.debug({ sequence: entry.sequence, outcome: entry.outcome }, 'Telemetry entry appended');
          resolve(ok(entry));
        } catch (error) {
          resolve(err(error instanceof Error ? error : new Error(String(error))));
        }
      });
    });
  }

  async getLastEntry(): Promise<TelemetryEntry | null> {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    const content = (await fs.promises.readFile(this.filePath, 'utf-8')).trim();
    if (content === '') {
      return null;
    }

    const lines = content.split('\n');
    return parseEntry(lines[lines.length - 1]);
  }

  async list(options: TelemetryQueryOptions = {}): Promise<TelemetryEntry[]> {
    const entries: TelemetryEntry[] = [];

    if (!fs.existsSync(this.filePath)) {
      return entries;
    }

    const rl = readline.createInterface({
      input: fs.createReadStream(this.filePath),
      crlfDelay: Infinity,
    });

    let skipped = 0;
    const offset = options.offset ?? 0;
    const limit = options.limit ?? Infinity;

    for await (const line of rl) {
      if (line.trim() === '') continue;
      const entry = parseEntry(line);

      if (options.outcome !== undefined && entry.outcome !== options.outcome) continue;
      if (options.since !== undefined && entry.timestamp < options.since) continue;
      if (options.until !== undefined && entry.timestamp > options.until) continue;

      if (skipped < offset) {
        skipped++;
        continue;
      }

      entries.push(entry);

      if (entries.length >= limit) {
        rl.close();
        break;
      }
    }

    return entries;
  }

  async verify(): Promise<VerificationResult> {
    if (!fs.existsSync(this.filePath)) {
      return { valid: true, entriesChecked: 0 };
    }

    const rl = readline.createInterface({
      input: fs.createReadStream(this.filePath),
      crlfDelay: Infinity,
    });

    let expectedSequence = 0;
    let expectedPrevHash = GENESIS_HASH;
    let entriesChecked = 0;

    for await (const line of rl) {
      if (line.trim() === '') continue;

      let entry: TelemetryEntry;
      try {
        entry = parseEntry(line);
      } catch {
        rl.close();
        return {
          valid: false,
          entriesChecked,
          firstInvalidSequence: expectedSequence,
          error: `Parse error at sequence ${expectedSequence}`,
        };
      }

      if (entry.sequence !== expectedSequence) {
        rl.close();
        return {
          valid: false,
          entriesChecked,
          firstInvalidSequence: entry.sequence,
          error: `Sequence mismatch: expected ${expectedSequence}, got ${entry.sequence}`,
        };
      }

      if (entry.prev_hash !== expectedPrevHash) {
        rl.close();
        return {
          valid: false,
          entriesChecked,
          firstInvalidSequence: entry.sequence,
          error: `Hash chain broken at sequence ${entry.sequence}`,
        };
      }

      const { hash: _hash, ...entryWithoutHash } = entry;
      if (entry.hash !== computeHash(entryWithoutHash)) {
        rl.close();
        return {
          valid: false,
          entriesChecked,
          firstInvalidSequence: entry.sequence,
          error: `Hash verification failed at sequence ${entry.sequence}`,
        };
      }

      expectedSequence++;
      expectedPrevHash = entry.hash;
      entriesChecked++;
    }

    return { valid: true, entriesChecked };
  }

  getSequence(): number {
    return this.sequence;
  }
}
