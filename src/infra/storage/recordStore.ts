import { ConcurrentModificationError } from '../../errors/taxonomy.js';
import { AppState, AuditAction, AuditEntry, EntityType, VersionRef } from '../../types.js';
import { isoNow } from '../../utils/time.js';
import { EventLogger } from '../logger.js';
import { StateStore } from './stateStore.js';

export interface Versioned {
  id: string;
  version: number;
}

/** Receives committed audit entries, e.g. a database mirror. */
export interface AuditSink {
  append(entries: AuditEntry[]): Promise<void>;
}

export const versionKey = (ref: VersionRef): string => `${ref.id}@${ref.version}`;

export const refOf = (record: Versioned): VersionRef => ({ id: record.id, version: record.version });

export const headOf = <T extends Versioned>(chains: Record<string, T[]>, id: string): T | undefined => {
  const chain = chains[id];
  return chain ? chain[chain.length - 1] : undefined;
};

export const versionOf = <T extends Versioned>(
  chains: Record<string, T[]>,
  id: string,
  version?: number,
): T | undefined => {
  if (version === undefined) return headOf(chains, id);
  return chains[id]?.find((record) => record.version === version);
};

/**
 * Write handle passed to `RecordStore.write`. Every helper records an audit
 * entry; none of them edits or removes a record that is already stored.
 */
export class RecordTx {
  readonly written: AuditEntry[] = [];
  readonly at = isoNow();

  constructor(readonly state: AppState) {}

  /**
   * Compare-and-set on a version chain: `record` becomes version
   * `expectedHead + 1` only if the chain head is still `expectedHead`.
   */
  appendVersion<T extends Versioned>(
    entity: EntityType,
    chains: Record<string, T[]>,
    record: T,
    expectedHead: number,
  ): T {
    const chain = chains[record.id] ?? [];
    const actualHead = chain.length === 0 ? 0 : chain[chain.length - 1].version;

    if (actualHead !== expectedHead || record.version !== expectedHead + 1) {
      throw new ConcurrentModificationError(
        { type: entity, id: record.id, version: record.version },
        expectedHead,
        actualHead,
      );
    }

    chains[record.id] = [...chain, record];
    this.audit(entity, versionKey(record), 'version');
    return record;
  }

  insertOnce<T>(
    entity: EntityType,
    table: Record<string, T>,
    key: string,
    record: T,
    onConflict: (existing: T) => Error,
  ): T {
    const existing = table[key];
    if (existing !== undefined) {
      throw onConflict(existing);
    }

    table[key] = record;
    this.audit(entity, key, 'insert');
    return record;
  }

  appendEntry<T>(entity: EntityType, log: Record<string, T[]>, key: string, entry: T): T {
    log[key] = [...(log[key] ?? []), entry];
    this.audit(entity, key, 'append');
    return entry;
  }

  noteAggregate(entity: EntityType, key: string): void {
    this.audit(entity, key, 'aggregate');
  }

  private audit(entity: EntityType, key: string, action: AuditAction): void {
    const entry: AuditEntry = {
      seq: this.state.auditLog.length + 1,
      at: this.at,
      entity,
      key,
      action,
    };
    this.state.auditLog.push(entry);
    this.written.push(entry);
  }
}

export class RecordStore {
  private sink?: AuditSink;

  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
  ) {}

  attachSink(sink: AuditSink): void {
    this.sink = sink;
  }

  read(): AppState {
    return this.store.snapshot();
  }

  async write<T>(work: (tx: RecordTx) => Promise<T> | T): Promise<T> {
    let written: AuditEntry[] = [];

    const result = await this.store.transaction(async (state) => {
      const tx = new RecordTx(state);
      const value = await work(tx);
      written = tx.written;
      return value;
    });

    if (this.sink && written.length > 0) {
      try {
        await this.sink.append(written);
      } catch (error) {
        // The state file is authoritative; a failed mirror is reported, not rolled back.
        await this.logger.log('error', 'audit.mirror.failed', {
          error: String(error),
          firstSeq: written[0].seq,
          count: written.length,
        });
      }
    }

    return result;
  }
}
