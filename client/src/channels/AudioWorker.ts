/**
 * Audio Worker
 * One-shot binary uploads over ws_audio. No response is expected.
 */

import { ChannelWorker, type ChannelWorkerOptions } from './ChannelWorker.js';
import { logger } from '../utils/logger.js';

export class AudioWorker extends ChannelWorker {
  constructor(options: ChannelWorkerOptions) {
    super('ws_audio', options);
  }

  /** Deliver one upload. Callers keep it under the device's frame limit. */
  async sendAudio(payload: Buffer): Promise<void> {
    logger.debug('Audio', `Uploading ${payload.length} bytes`);
    await this.send(payload, true);
  }

  // The loop only keeps the connection alive
  protected async dutyCycle(): Promise<void> {}
}
