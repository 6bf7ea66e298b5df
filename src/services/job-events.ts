/**
 * Job Event Hub - in-process publish/subscribe for job state deltas
 *
 * One channel per job. Sequence numbers are per job and strictly
 * increasing, so observers can order what they receive.
 */

import { EventEmitter } from 'node:events';
import type { IJobEventHub, JobEvent, JobEventInput, JobEventListener } from '../engine/index.js';
import { createLogger } from '../logger.js';

const log = createLogger('job-events');

function channelFor(jobId: string): string {
  return `job:${jobId}`;
}

export class JobEventHub implements IJobEventHub {
  private emitter = new EventEmitter();
  private sequences = new Map<string, number>();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  publish(jobId: string, input: JobEventInput): JobEvent {
    const sequence = (this.sequences.get(jobId) ?? 0) + 1;
    const event: JobEvent = { ...input, jobId, sequence };

    if (event.type === 'end') {
      this.sequences.delete(jobId);
    } else {
      this.sequences.set(jobId, sequence);
    }

    try {
      this.emitter.emit(channelFor(jobId), event);
    } catch (error) {
      log.error({ jobId, err: error }, 'Job event listener threw');
    }
    return event;
  }

  subscribe(jobId: string, listener: JobEventListener): () => void {
    const channel = channelFor(jobId);
    this.emitter.on(channel, listener);
    return () => {
      this.emitter.off(channel, listener);
    };
  }

  listenerCount(jobId: string): number {
    return this.emitter.listenerCount(channelFor(jobId));
  }
}
