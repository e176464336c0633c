/**
 * Cache of the latest Sample per fingerprint.
 *
 * All mutation happens in one consumer task fed by a channel of commands:
 *  - `sample`: insert or replace the entry for its fingerprint
 *  - `sweep`:  evict every entry whose event time is older than now − expiry
 *
 * Listeners only send; the scrape path only copies. A sweep timer sends a
 * `sweep` command once per interval, so eviction is serialized with inserts.
 */

import type { Sample } from '../types/sample.ts';
import type { ExporterContext } from './ExporterContext.ts';
import { Channel } from './Channel.ts';

export const SWEEP_INTERVAL_MS = 60_000;

export type StoreCommand = { kind: 'sample'; sample: Sample } | { kind: 'sweep' };

export interface SampleStoreOptions {
  sweepIntervalMs?: number;
}

export class SampleStore {
  private readonly samples = new Map<string, Sample>();
  private readonly channel = new Channel<StoreCommand>();
  private readonly sweepIntervalMs: number;
  private sweepTimer: NodeJS.Timeout | undefined;
  private consumer: Promise<void> | undefined;
  private pending = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly ctx: ExporterContext,
    options: SampleStoreOptions = {}
  ) {
    this.sweepIntervalMs = options.sweepIntervalMs ?? SWEEP_INTERVAL_MS;
  }

  /** Start the consumer task and the sweep timer. Idempotent. */
  start(): void {
    if (this.consumer) return;
    this.consumer = this.consume();
    this.sweepTimer = setInterval(() => this.requestSweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  /** Stop the sweep timer, close the channel and wait for the consumer to drain. */
  async stop(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    this.channel.close();
    await this.consumer;
  }

  /** Hand a sample to the consumer. Dropped with a warning once stopped. */
  submit(sample: Sample): void {
    this.send({ kind: 'sample', sample });
  }

  requestSweep(): void {
    this.send({ kind: 'sweep' });
  }

  /** Resolves once every command sent so far has been applied. */
  settled(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Copy of the current entries, expired or not. */
  snapshot(): Sample[] {
    return [...this.samples.values()];
  }

  get size(): number {
    return this.samples.size;
  }

  private send(command: StoreCommand): void {
    if (!this.channel.send(command)) {
      this.ctx.logger.warn('sample store stopped, dropping command', { kind: command.kind });
      return;
    }
    this.pending++;
  }

  private async consume(): Promise<void> {
    for await (const command of this.channel) {
      try {
        this.apply(command);
      } catch (err) {
        this.ctx.logger.error('sample store command failed', {
          kind: command.kind,
          error: err instanceof Error ? err.message : String(err),
        });
      } finally {
        this.pending--;
        if (this.pending === 0) this.notifyIdle();
      }
    }
  }

  private apply(command: StoreCommand): void {
    switch (command.kind) {
      case 'sample':
        this.samples.set(command.sample.fingerprint, command.sample);
        return;
      case 'sweep':
        this.sweep();
        return;
    }
  }

  private sweep(): void {
    const cutoff = this.ctx.cutoff();
    let evicted = 0;
    for (const [key, sample] of this.samples) {
      if (this.ctx.isExpired(sample, cutoff)) {
        this.samples.delete(key);
        evicted++;
      }
    }
    if (evicted > 0) {
      this.ctx.logger.debug('swept expired samples', { evicted, remaining: this.samples.size });
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
