/**
 * Fake Streams Redis
 *
 * In-process StreamsRedis covering the commands the Redis Streams broker
 * sends: XADD, XGROUP CREATE, XREADGROUP and XACK. Connections made
 * with duplicate() share one store, like connections to one server.
 *
 * XREADGROUP never blocks: it answers null when nothing is pending.
 */

import type { StreamsRedis } from '@msgtrace/core';

export interface RedisCommandRecord {
  command: string;
  args: Array<string | number>;
}

interface GroupState {
  lastDeliveredIndex: number;
  pending: Set<string>;
}

interface StreamState {
  entries: Array<{ id: string; fields: string[] }>;
  groups: Map<string, GroupState>;
  lastSequence: number;
}

export class FakeRedisStore {
  readonly streams = new Map<string, StreamState>();
  readonly commands: RedisCommandRecord[] = [];
  readonly failures: Array<{ command: string; error: Error }> = [];
  connectFailures: Error[] = [];
  connections = 0;
  disconnects = 0;
}

function asString(value: string | number | undefined): string {
  return value === undefined ? '' : String(value);
}

export class FakeStreamsRedis implements StreamsRedis {
  private readonly store: FakeRedisStore;
  private connected = false;
  private readonly errorListeners: Array<(error: Error) => void> = [];

  constructor(store?: FakeRedisStore) {
    this.store = store ?? new FakeRedisStore();
  }

  // ===========================================================================
  // Test Controls
  // ===========================================================================

  failConnect(times = 1, error: Error = new Error('connect ECONNREFUSED 127.0.0.1:6379')): void {
    for (let i = 0; i < times; i++) {
      this.store.connectFailures.push(error);
    }
  }

  /** Fail the next call of `command` */
  failCommand(command: string, error: Error): void {
    this.store.failures.push({ command: command.toUpperCase(), error });
  }

  emitError(error: Error): void {
    for (const listener of this.errorListeners) {
      listener(error);
    }
  }

  getCommands(command?: string): RedisCommandRecord[] {
    return command
      ? this.store.commands.filter(record => record.command === command.toUpperCase())
      : [...this.store.commands];
  }

  getStreamLength(stream: string): number {
    return this.store.streams.get(stream)?.entries.length ?? 0;
  }

  hasGroup(stream: string, group: string): boolean {
    return this.store.streams.get(stream)?.groups.has(group) ?? false;
  }

  getPendingCount(stream: string, group: string): number {
    return this.store.streams.get(stream)?.groups.get(group)?.pending.size ?? 0;
  }

  getConnectionCount(): number {
    return this.store.connections;
  }

  getDisconnectCount(): number {
    return this.store.disconnects;
  }

  isConnected(): boolean {
    return this.connected;
  }

  // ===========================================================================
  // StreamsRedis
  // ===========================================================================

  async connect(): Promise<void> {
    const failure = this.store.connectFailures.shift();
    if (failure) {
      throw failure;
    }
    this.connected = true;
    this.store.connections++;
  }

  duplicate(): StreamsRedis {
    return new FakeStreamsRedis(this.store);
  }

  disconnect(): void {
    if (this.connected) {
      this.connected = false;
      this.store.disconnects++;
    }
  }

  on(_event: 'error', listener: (error: Error) => void): void {
    this.errorListeners.push(listener);
  }

  async sendCommand(command: string, args: Array<string | number>): Promise<unknown> {
    const name = command.toUpperCase();
    this.store.commands.push({ command: name, args: [...args] });

    if (!this.connected) {
      throw new Error('Connection is closed.');
    }
    const failureIndex = this.store.failures.findIndex(failure => failure.command === name);
    if (failureIndex >= 0) {
      const [failure] = this.store.failures.splice(failureIndex, 1);
      throw failure.error;
    }

    switch (name) {
      case 'XADD':
        return this.xadd(args);
      case 'XGROUP':
        return this.xgroup(args);
      case 'XREADGROUP':
        return this.xreadgroup(args);
      case 'XACK':
        return this.xack(args);
      default:
        throw new Error(`ERR unknown command '${command}'`);
    }
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  private getStream(name: string): StreamState {
    let stream = this.store.streams.get(name);
    if (!stream) {
      stream = { entries: [], groups: new Map(), lastSequence: 0 };
      this.store.streams.set(name, stream);
    }
    return stream;
  }

  /** XADD stream * field value ... */
  private xadd(args: Array<string | number>): string {
    const stream = this.getStream(asString(args[0]));
    stream.lastSequence++;
    const id = `${stream.lastSequence}-0`;
    stream.entries.push({ id, fields: args.slice(2).map(asString) });
    return id;
  }

  /** XGROUP CREATE stream group startId [MKSTREAM] */
  private xgroup(args: Array<string | number>): string {
    const [subcommand, streamName, groupName, startId] = args.map(asString);
    if (subcommand.toUpperCase() !== 'CREATE') {
      throw new Error(`ERR unsupported XGROUP subcommand '${subcommand}'`);
    }
    const mkstream = args.map(asString).some(arg => arg.toUpperCase() === 'MKSTREAM');
    if (!this.store.streams.has(streamName) && !mkstream) {
      throw new Error('ERR The XGROUP subcommand requires the key to exist');
    }

    const stream = this.getStream(streamName);
    if (stream.groups.has(groupName)) {
      throw new Error('BUSYGROUP Consumer Group name already exists');
    }
    stream.groups.set(groupName, {
      lastDeliveredIndex: startId === '$' ? stream.entries.length : 0,
      pending: new Set(),
    });
    return 'OK';
  }

  /** XREADGROUP GROUP group consumer [COUNT n] [BLOCK ms] STREAMS stream > */
  private xreadgroup(args: Array<string | number>): unknown {
    const tokens = args.map(asString);
    const groupName = tokens[1];
    const countIndex = tokens.findIndex(token => token.toUpperCase() === 'COUNT');
    const count = countIndex >= 0 ? Number(tokens[countIndex + 1]) : Number.POSITIVE_INFINITY;
    const streamsIndex = tokens.findIndex(token => token.toUpperCase() === 'STREAMS');
    const streamName = tokens[streamsIndex + 1];

    const stream = this.store.streams.get(streamName);
    const group = stream?.groups.get(groupName);
    if (!stream || !group) {
      throw new Error(`NOGROUP No such key '${streamName}' or consumer group '${groupName}'`);
    }

    const batch = stream.entries.slice(group.lastDeliveredIndex, group.lastDeliveredIndex + count);
    if (batch.length === 0) {
      return null;
    }
    group.lastDeliveredIndex += batch.length;
    for (const entry of batch) {
      group.pending.add(entry.id);
    }
    return [[streamName, batch.map(entry => [entry.id, [...entry.fields]])]];
  }

  /** XACK stream group id ... */
  private xack(args: Array<string | number>): number {
    const [streamName, groupName, ...ids] = args.map(asString);
    const group = this.store.streams.get(streamName)?.groups.get(groupName);
    if (!group) {
      return 0;
    }
    let acked = 0;
    for (const id of ids) {
      if (group.pending.delete(id)) {
        acked++;
      }
    }
    return acked;
  }
}
