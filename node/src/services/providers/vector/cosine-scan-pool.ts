// Worker-thread pool for the local backend's exact nearest-neighbour scan.
// Decoding stored embeddings and computing cosine distances happen off the event loop.
import { Worker } from 'worker_threads';
import os from 'os';
import { z } from 'zod';
import type { Embedding } from '@/types/core';
import { logger } from '@/services/logger';

export interface ScanHit {
  /** Position in the `embeddings` array passed to `scan`. */
  index: number;
  distance: number;
}

// Runs as a CommonJS script inside each worker. Embeddings arrive as JSON text (or
// already-decoded arrays); rows of another dimension or that fail to decode are skipped.
const SCAN_WORKER_SOURCE = `
const { parentPort } = require('worker_threads');

function decode(raw) {
  if (Array.isArray(raw)) return raw;
  if (typeof raw !== 'string') return null;
  try {
    const parsed = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function cosineDistance(q, qNorm, v) {
  let dot = 0;
  let vv = 0;
  for (let i = 0; i < q.length; i++) {
    dot += q[i] * v[i];
    vv += v[i] * v[i];
  }
  if (qNorm === 0 || vv === 0) return 1;
  return Math.max(0, 1 - dot / (qNorm * Math.sqrt(vv)));
}

parentPort.on('message', (task) => {
  try {
    const q = task.query;
    let qq = 0;
    for (let i = 0; i < q.length; i++) qq += q[i] * q[i];
    const qNorm = Math.sqrt(qq);

    const hits = [];
    for (let index = 0; index < task.embeddings.length; index++) {
      const v = decode(task.embeddings[index]);
      if (!v || v.length !== q.length) continue;
      const distance = cosineDistance(q, qNorm, v);
      if (Number.isFinite(distance)) hits.push({ index, distance });
    }
    hits.sort((a, b) => a.distance - b.distance || a.index - b.index);
    parentPort.postMessage({ id: task.id, hits: hits.slice(0, task.topN) });
  } catch (err) {
    parentPort.postMessage({ id: task.id, error: err instanceof Error ? err.message : String(err) });
  }
});
`;

const scanReplySchema = z.union([
  z.object({
    id: z.number(),
    hits: z.array(z.object({ index: z.number().int().nonnegative(), distance: z.number() })),
  }),
  z.object({ id: z.number(), error: z.string() }),
]);

interface PendingScan {
  resolve: (hits: ScanHit[]) => void;
  reject: (err: Error) => void;
}

interface PoolSlot {
  worker: Worker;
  pending: Map<number, PendingScan>;
}

export function defaultScanPoolSize(): number {
  return Math.max(1, Math.min(4, os.availableParallelism() - 1));
}

export class CosineScanPool {
  private readonly slots: PoolSlot[] = [];
  private nextTaskId = 0;
  private closed = false;

  constructor(private readonly size = defaultScanPoolSize()) {}

  /**
   * Closest `topN` rows to `query`, ordered by distance then by position.
   */
  scan(query: Embedding, embeddings: unknown[], topN: number): Promise<ScanHit[]> {
    if (this.closed) return Promise.reject(new Error('scan pool is closed'));
    if (embeddings.length === 0 || topN <= 0) return Promise.resolve([]);

    const slot = this.pickSlot();
    const id = ++this.nextTaskId;
    return new Promise<ScanHit[]>((resolve, reject) => {
      slot.pending.set(id, { resolve, reject });
      // Keep the process alive only while a scan is in flight
      slot.worker.ref();
      slot.worker.postMessage({ id, query, embeddings, topN });
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    const slots = this.slots.splice(0);
    for (const slot of slots) this.failPending(slot, new Error('scan pool is closed'));
    await Promise.all(slots.map((slot) => slot.worker.terminate()));
  }

  private pickSlot(): PoolSlot {
    const idle = this.slots.find((s) => s.pending.size === 0);
    if (idle) return idle;
    if (this.slots.length < this.size) return this.spawn();
    return this.slots.reduce((least, s) => (s.pending.size < least.pending.size ? s : least));
  }

  private spawn(): PoolSlot {
    const worker = new Worker(SCAN_WORKER_SOURCE, { eval: true });
    worker.unref();
    const slot: PoolSlot = { worker, pending: new Map() };

    worker.on('message', (message: unknown) => this.settle(slot, message));
    worker.on('error', (err: Error) => {
      logger.error('scan_pool:worker_error', { error: err.message });
      this.retire(slot, err);
    });
    worker.on('exit', (code: number) => {
      if (this.closed) return;
      this.retire(slot, new Error(`scan worker exited with code ${code}`));
    });

    this.slots.push(slot);
    return slot;
  }

  private settle(slot: PoolSlot, message: unknown): void {
    const reply = scanReplySchema.safeParse(message);
    if (!reply.success) {
      logger.warn('scan_pool:bad_reply', { error: reply.error.message });
      return;
    }
    const pending = slot.pending.get(reply.data.id);
    if (!pending) return;
    slot.pending.delete(reply.data.id);
    if (slot.pending.size === 0) slot.worker.unref();

    if ('error' in reply.data) pending.reject(new Error(reply.data.error));
    else pending.resolve(reply.data.hits);
  }

  private retire(slot: PoolSlot, err: Error): void {
    const at = this.slots.indexOf(slot);
    if (at !== -1) this.slots.splice(at, 1);
    this.failPending(slot, err);
  }

  private failPending(slot: PoolSlot, err: Error): void {
    for (const pending of slot.pending.values()) pending.reject(err);
    slot.pending.clear();
  }
}
