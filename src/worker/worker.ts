/**
 * The worker actor
 *
 * Owns every network call and cache write made on behalf of a front end.
 * Requests are taken off the inbound channel strictly in arrival order.
 * A preload batch is started in order but runs in the background so it never
 * holds up the requests behind it.
 */

import { TriageError, errorMessage, type WorkerRequest, type WorkerResponse } from '../types/index.js';
import { log } from '../logger.js';
import type { TriageBackend } from './backend.js';
import type { Channel } from './channel.js';

export class TriageWorker {
  private loop: Promise<void> | null = null;
  private readonly background = new Set<Promise<void>>();

  constructor(
    private readonly backend: TriageBackend,
    private readonly requests: Channel<WorkerRequest>,
    private readonly responses: Channel<WorkerResponse>
  ) {}

  get running(): boolean {
    return this.loop !== null;
  }

  /**
   * Start consuming requests. Resolves once stop() has closed the inbound channel
   * and every buffered request was handled.
   */
  start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.run();
    }
    return this.loop;
  }

  /**
   * Close the inbound channel and wait for in-flight work, background preloads included
   */
  async stop(): Promise<void> {
    this.requests.close();
    if (this.loop) {
      await this.loop;
    }
    await Promise.all([...this.background]);
    this.loop = null;
  }

  private async run(): Promise<void> {
    for await (const request of this.requests) {
      if (request.type === 'preload-batch') {
        this.track(this.process(request));
        continue;
      }
      await this.process(request);
    }
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        log.worker.error({ error: errorMessage(error) }, 'background request could not deliver its response');
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }

  /**
   * Handle one request. Handler failures become error-result messages.
   */
  private async process(request: WorkerRequest): Promise<void> {
    let response: WorkerResponse;
    try {
      response = await this.backend.handle(request);
    } catch (error) {
      log.worker.warn(
        { requestId: request.requestId, type: request.type, error: errorMessage(error) },
        'request failed'
      );
      response = {
        type: 'error-result',
        requestId: request.requestId,
        request,
        code: error instanceof TriageError ? error.code : 'INTERNAL_ERROR',
        error: errorMessage(error),
      };
    }
    await this.responses.send(response);
  }
}
