/**
 * Ingestion pipeline shared by the HTTP and UDP listeners:
 * process(body, precision) → PipelineResult
 *
 * Steps:
 *  1. Decode the line-protocol payload (all-or-nothing)
 *  2. Translate every point to Samples
 *  3. Hand each Sample to the store's channel
 *
 * Transport concerns (reading the body, setting the liveness gauge,
 * counting UDP parse errors) stay with the listeners.
 */

import type { ExporterContext } from './ExporterContext.ts';
import type { SampleStore } from './SampleStore.ts';
import type { Point } from '../types/lineProtocol.ts';
import { LineProtocolError, parsePoints } from '../proto/lineProtocol.ts';
import { pointToSamples } from '../transform/pointToSamples.ts';

export interface PipelineResult {
  status: number;
  message: string;
  /** Samples handed to the store. */
  samples: number;
}

export class Pipeline {
  constructor(
    private readonly ctx: ExporterContext,
    private readonly store: SampleStore
  ) {}

  process(body: string | Uint8Array, precision = 'ns'): PipelineResult {
    let points: Point[];
    try {
      points = parsePoints(body, {
        precision,
        now: BigInt(Math.floor(this.ctx.now())) * 1_000_000n,
      });
    } catch (err) {
      if (err instanceof LineProtocolError) {
        return { status: 400, message: `error parsing request: ${err.message}`, samples: 0 };
      }
      throw err;
    }

    let forwarded = 0;
    for (const point of points) {
      for (const sample of pointToSamples(point)) {
        if (this.ctx.logger.isDebugEnabled()) {
          this.ctx.logger.debug('sample', {
            name: sample.name,
            labels: Object.fromEntries(sample.labels),
            value: sample.value,
            timestamp: sample.timestamp.toString(),
          });
        }
        this.store.submit(sample);
        forwarded++;
      }
    }

    return { status: 204, message: '', samples: forwarded };
  }
}
