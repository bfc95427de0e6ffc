/**
 * Front end side of the worker channels
 *
 * submit() and poll() never wait: a front end stays responsive and picks up
 * responses whenever it gets around to it.
 */

import { randomUUID } from 'node:crypto';
import {
  TriageError,
  errorMessage,
  type RequestInput,
  type WorkerRequest,
  type WorkerResponse,
} from '../types/index.js';
import { log } from '../logger.js';
import { REQUEST_CHANNEL_CAPACITY, RESPONSE_CHANNEL_CAPACITY } from '../utils/constants.js';
import type { TriageBackend } from './backend.js';
import { Channel } from './channel.js';
import { TriageWorker } from './worker.js';

export class WorkerBus {
  // Responses taken off the channel by waitFor() on behalf of other callers
  private readonly held: WorkerResponse[] = [];

  constructor(
    private readonly requests: Channel<WorkerRequest>,
    private readonly responses: Channel<WorkerResponse>,
    private readonly nextId: () => string = randomUUID
  ) {}

  /**
   * Queue a request for the worker; returns its id
   */
  submit(input: RequestInput): string {
    const requestId = this.nextId();
    const request: WorkerRequest = { ...input, requestId };
    if (!this.requests.trySend(request)) {
      throw new TriageError('Worker request queue is full', 'REQUEST_QUEUE_FULL', {
        capacity: this.requests.capacity,
      });
    }
    return requestId;
  }

  /**
   * Next completed response, if any
   */
  poll(): WorkerResponse | undefined {
    return this.held.shift() ?? this.responses.tryReceive();
  }

  /**
   * Every completed response, in completion order
   */
  drain(): WorkerResponse[] {
    return [...this.held.splice(0), ...this.responses.drain()];
  }

  /**
   * Wait for the response to one request. Other responses that arrive meanwhile
   * stay available to poll()/drain().
   */
  async waitFor(requestId: string): Promise<WorkerResponse> {
    const heldIndex = this.held.findIndex((response) => response.requestId === requestId);
    if (heldIndex >= 0) {
      return this.held.splice(heldIndex, 1)[0];
    }

    for (;;) {
      const response = await this.responses.receive();
      if (response === undefined) {
        throw new TriageError('Worker stopped before responding', 'WORKER_STOPPED', { requestId });
      }
      if (response.requestId === requestId) {
        return response;
      }
      this.held.push(response);
    }
  }

  /**
   * submit() followed by waitFor(), for callers that can afford to wait (the CLI)
   */
  async request(input: RequestInput): Promise<WorkerResponse> {
    return this.waitFor(this.submit(input));
  }
}

export interface WorkerHandle {
  bus: WorkerBus;
  worker: TriageWorker;
}

/**
 * Wire a backend to a fresh channel pair and start its worker
 */
export function startWorker(
  backend: TriageBackend,
  options: { requestCapacity?: number; responseCapacity?: number; nextId?: () => string } = {}
): WorkerHandle {
  const requests = new Channel<WorkerRequest>(options.requestCapacity ?? REQUEST_CHANNEL_CAPACITY);
  const responses = new Channel<WorkerResponse>(options.responseCapacity ?? RESPONSE_CHANNEL_CAPACITY);
  const worker = new TriageWorker(backend, requests, responses);
  const bus = new WorkerBus(requests, responses, options.nextId);
  void worker.start().catch((error: unknown) => {
    log.worker.error({ error: errorMessage(error) }, 'worker loop stopped');
  });
  return { bus, worker };
}
