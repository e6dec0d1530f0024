/**
 * Command Worker
 * Request/response over ws_cmd, one command in flight at a time.
 */

import { z } from 'zod';
import { ChannelWorker, type ChannelWorkerOptions } from './ChannelWorker.js';
import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { DisconnectedError, ReceiveError } from '../errors.js';
import type { Command, CommandStatus, Frame } from '../types/index.js';

export const UNKNOWN_COMMAND_ID = 'cmd_unknown';

const responseSchema = z.object({
  cmd_id: z.string(),
  status: z.enum(['complete', 'in_progress', 'error']),
  error_info: z.string().optional(),
});

export type CommandOutcome =
  | { kind: 'accepted'; commandId: string; status: Exclude<CommandStatus, 'error'> }
  | { kind: 'rejected'; commandId: string; reason: string }
  | { kind: 'unknown'; commandId: string }
  | { kind: 'invalid'; commandId: string; reason: string };

/** Classify one raw response to `commandId`. */
export function decodeResponse(commandId: string, payload: Frame | string): CommandOutcome {
  let json: unknown;
  try {
    json = JSON.parse(payload.toString());
  } catch (err) {
    return { kind: 'invalid', commandId, reason: `could not parse response: ${err instanceof Error ? err.message : String(err)}` };
  }
  // checked before the schema: the device may omit the status for unknown ids
  if (typeof json === 'object' && json !== null && 'cmd_id' in json && json.cmd_id === UNKNOWN_COMMAND_ID) {
    return { kind: 'unknown', commandId };
  }
  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) {
    return { kind: 'invalid', commandId, reason: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }
  const response = parsed.data;
  if (response.status === 'error') {
    return { kind: 'rejected', commandId, reason: response.error_info ?? 'no reason given' };
  }
  return { kind: 'accepted', commandId: response.cmd_id, status: response.status };
}

export interface CommandWorkerOptions extends ChannelWorkerOptions {
  responseTimeoutMs?: number;
}

export class CommandWorker extends ChannelWorker {
  private readonly responseTimeoutMs: number;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: CommandWorkerOptions) {
    super('ws_cmd', options);
    this.responseTimeoutMs = options.responseTimeoutMs ?? ENV.COMMAND_TIMEOUT_MS;
  }

  /**
   * Send `command` and wait for its response. Concurrent callers are queued.
   * A lost connection surfaces as DisconnectedError; the command is never resent.
   */
  send(command: Command): Promise<CommandOutcome>;
  send(payload: Buffer | string, binary?: boolean): Promise<void>;
  send(payload: Command | Buffer | string, binary: boolean = true): Promise<CommandOutcome | void> {
    if (typeof payload === 'string' || Buffer.isBuffer(payload)) {
      return super.send(payload, binary);
    }
    const command = payload;
    const next = this.queue.then(() => this.exchange(command));
    // keep the chain alive after a failure; the caller still sees the rejection
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async exchange(command: Command): Promise<CommandOutcome> {
    const commandId = command.cmd_id;
    const wire = JSON.stringify(command);
    logger.debug('Command', `-> ${wire}`);
    await super.send(Buffer.from(wire), true);

    let frame: Frame;
    try {
      frame = await this.receive(this.responseTimeoutMs);
    } catch (err) {
      if (err instanceof ReceiveError) {
        throw new DisconnectedError(`robot got disconnected after sending cmd_id: ${commandId}`, { cause: err });
      }
      throw err;
    }

    const outcome = decodeResponse(commandId, frame);
    logger.debug('Command', `<- ${commandId}: ${outcome.kind}`);
    return outcome;
  }

  // The loop only keeps the connection alive
  protected async dutyCycle(): Promise<void> {}
}
