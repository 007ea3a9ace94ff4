import { BrokerReplyError } from '../../domain/index.js';
import type { StreamEntry } from '../stream/stream-client.js';

interface PendingEntry {
  consumer: string;
  delivered_at: number;
  deliveries: number;
}

interface ConsumerGroup {
  last_delivered_id: string;
  pending: Map<string, PendingEntry>;
}

interface MemoryStream {
  entries: StreamEntry[];
  groups: Map<string, ConsumerGroup>;
  last_id: string;
}

interface StoredKey {
  value: string;
  expires_at: number;
}

/** Hooks a client registers so the broker can cut its connection. */
export interface BrokerConnection {
  drop(): void;
}

/** Orders `<ms>-<seq>` entry ids numerically. */
export function compareEntryIds(a: string, b: string): number {
  const [aMs = '0', aSeq = '0'] = a.split('-');
  const [bMs = '0', bSeq = '0'] = b.split('-');
  const byMs = Number(aMs) - Number(bMs);
  return byMs !== 0 ? byMs : Number(aSeq) - Number(bSeq);
}

function noGroup(stream: string, group: string): BrokerReplyError {
  return new BrokerReplyError(
    `NOGROUP No such key '${stream}' or consumer group '${group}'`,
  );
}

/**
 * In-process stand-in for the Redis side of the relay: streams with
 * consumer groups, pending entries lists and expiring string keys.
 *
 * Shared by every `InMemoryStreamClient` created against it, the way
 * several ioredis connections share one server. Commands run
 * synchronously once a client has passed its connection checks, so each
 * one is atomic.
 */
export class InMemoryStreamBroker {
  private readonly streams = new Map<string, MemoryStream>();
  private readonly keys = new Map<string, StoredKey>();
  private readonly connections = new Set<BrokerConnection>();
  private readonly appendListeners = new Map<string, Set<() => void>>();
  private readonly scriptedFailures: Error[] = [];
  private available = true;
  private latencyMs = 0;
  private lastMs = 0;
  private lastSeq = 0;

  constructor(private readonly now: () => number = Date.now) {}

  // ---------------------------------------------------------------
  // Connection bookkeeping and fault injection
  // ---------------------------------------------------------------

  isAvailable(): boolean {
    return this.available;
  }

  register(connection: BrokerConnection): void {
    this.connections.add(connection);
  }

  unregister(connection: BrokerConnection): void {
    this.connections.delete(connection);
  }

  connectionCount(): number {
    return this.connections.size;
  }

  /** Cuts every open connection. Clients reconnect through their retry strategy. */
  dropConnections(): void {
    for (const connection of [...this.connections]) {
      connection.drop();
    }
  }

  /** `false` simulates an outage: connections drop and reconnects fail until restored. */
  setAvailable(available: boolean): void {
    this.available = available;
    if (!available) this.dropConnections();
  }

  /** The next `count` commands reject with `error` without executing. */
  failNextCommands(count: number, error: Error): void {
    for (let i = 0; i < count; i++) this.scriptedFailures.push(error);
  }

  setLatency(ms: number): void {
    this.latencyMs = ms;
  }

  get latency(): number {
    return this.latencyMs;
  }

  /** Pops the next scripted failure, if any. */
  takeScriptedFailure(): Error | undefined {
    return this.scriptedFailures.shift();
  }

  onAppend(stream: string, listener: () => void): () => void {
    const listeners = this.appendListeners.get(stream) ?? new Set<() => void>();
    this.appendListeners.set(stream, listeners);
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------
  // Inspection
  // ---------------------------------------------------------------

  entries(stream: string): StreamEntry[] {
    return (this.streams.get(stream)?.entries ?? []).map((e) => ({ id: e.id, fields: [...e.fields] }));
  }

  pendingCount(stream: string, group: string): number {
    return this.streams.get(stream)?.groups.get(group)?.pending.size ?? 0;
  }

  hasStream(stream: string): boolean {
    return this.streams.has(stream);
  }

  deleteStream(stream: string): void {
    this.streams.delete(stream);
  }

  // ---------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------

  ensureGroup(stream: string, group: string, start: '0' | '$'): boolean {
    const target = this.streamOrCreate(stream);
    if (target.groups.has(group)) return false;
    target.groups.set(group, {
      last_delivered_id: start === '$' ? target.last_id : '0-0',
      pending: new Map(),
    });
    return true;
  }

  getKey(key: string): string | null {
    const stored = this.keys.get(key);
    if (!stored) return null;
    if (stored.expires_at <= this.now()) {
      this.keys.delete(key);
      return null;
    }
    return stored.value;
  }

  setKey(key: string, value: string, ttlMs: number): void {
    this.keys.set(key, { value, expires_at: this.now() + ttlMs });
  }

  /** XADD NOMKSTREAM: null when the stream does not exist. */
  appendIfExists(stream: string, fields: string[], maxLength: number): string | null {
    if (!this.streams.has(stream)) return null;
    return this.append(stream, fields, maxLength);
  }

  append(stream: string, fields: string[], maxLength: number): string {
    const target = this.streamOrCreate(stream);
    const id = this.nextId();
    target.entries.push({ id, fields: [...fields] });
    target.last_id = id;
    if (maxLength > 0 && target.entries.length > maxLength) {
      target.entries.splice(0, target.entries.length - maxLength);
    }
    for (const listener of [...(this.appendListeners.get(stream) ?? [])]) {
      listener();
    }
    return id;
  }

  readNew(stream: string, group: string, consumer: string, count: number): StreamEntry[] {
    const { target, consumerGroup } = this.group(stream, group);
    const delivered: StreamEntry[] = [];
    for (const entry of target.entries) {
      if (delivered.length >= count) break;
      if (compareEntryIds(entry.id, consumerGroup.last_delivered_id) <= 0) continue;
      consumerGroup.pending.set(entry.id, { consumer, delivered_at: this.now(), deliveries: 1 });
      consumerGroup.last_delivered_id = entry.id;
      delivered.push({ id: entry.id, fields: [...entry.fields] });
    }
    return delivered;
  }

  readPending(stream: string, group: string, consumer: string, count: number): StreamEntry[] {
    const { target, consumerGroup } = this.group(stream, group);
    const ids = [...consumerGroup.pending.entries()]
      .filter(([, pending]) => pending.consumer === consumer)
      .map(([id]) => id)
      .sort(compareEntryIds)
      .slice(0, count);

    return ids.map((id) => {
      const pending = consumerGroup.pending.get(id);
      if (pending) {
        pending.deliveries++;
        pending.delivered_at = this.now();
      }
      const entry = target.entries.find((e) => e.id === id);
      return { id, fields: entry ? [...entry.fields] : [] };
    });
  }

  ack(stream: string, group: string, ids: string[]): number {
    const consumerGroup = this.streams.get(stream)?.groups.get(group);
    if (!consumerGroup) return 0;
    let count = 0;
    for (const id of ids) {
      if (consumerGroup.pending.delete(id)) count++;
    }
    return count;
  }

  claimIdle(stream: string, group: string, consumer: string, minIdleMs: number, count: number): StreamEntry[] {
    const { target, consumerGroup } = this.group(stream, group);
    const now = this.now();
    const claimed: StreamEntry[] = [];
    const ids = [...consumerGroup.pending.keys()].sort(compareEntryIds);

    for (const id of ids) {
      if (claimed.length >= count) break;
      const pending = consumerGroup.pending.get(id);
      if (!pending || now - pending.delivered_at < minIdleMs) continue;

      const entry = target.entries.find((e) => e.id === id);
      if (!entry) {
        // trimmed away: drop from the PEL, nothing to deliver
        consumerGroup.pending.delete(id);
        continue;
      }
      pending.consumer = consumer;
      pending.deliveries++;
      pending.delivered_at = now;
      claimed.push({ id, fields: [...entry.fields] });
    }
    return claimed;
  }

  /** Appends `fields` to `toStream` and acknowledges `entryId` in one step. */
  move(fromStream: string, group: string, entryId: string, toStream: string, fields: string[], maxLength: number): string {
    const { consumerGroup } = this.group(fromStream, group);
    const id = this.append(toStream, fields, maxLength);
    consumerGroup.pending.delete(entryId);
    return id;
  }

  deliveryCount(stream: string, group: string, id: string): number {
    return this.streams.get(stream)?.groups.get(group)?.pending.get(id)?.deliveries ?? 0;
  }

  private group(stream: string, group: string): { target: MemoryStream; consumerGroup: ConsumerGroup } {
    const target = this.streams.get(stream);
    const consumerGroup = target?.groups.get(group);
    if (!target || !consumerGroup) throw noGroup(stream, group);
    return { target, consumerGroup };
  }

  private streamOrCreate(stream: string): MemoryStream {
    let target = this.streams.get(stream);
    if (!target) {
      target = { entries: [], groups: new Map(), last_id: '0-0' };
      this.streams.set(stream, target);
    }
    return target;
  }

  private nextId(): string {
    const ms = this.now();
    if (ms > this.lastMs) {
      this.lastMs = ms;
      this.lastSeq = 0;
    } else {
      this.lastSeq++;
    }
    return `${this.lastMs}-${this.lastSeq}`;
  }
}
