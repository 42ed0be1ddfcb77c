/**
 * Log-only transport
 *
 * Stand-in used when no carrier transport is wired (local runs, demos).
 * Simulates a short network round trip and always accepts the message.
 */

import { v4 as uuidv4 } from 'uuid';
import type { DeliveryOptions, PhoneNumber, SenderIdentity, SmsTransport, TransportResult } from '../types';
import { logger, maskPhone } from '../utils/logger';
import { describeSender } from '../services/senderIdentity';

export class LogOnlyTransport implements SmsTransport {
  readonly name = 'log-only';
  private readonly log = logger.child({ component: 'log-only-transport' });

  constructor(private readonly latencyMs: number = 0) {}

  async send(
    sender: SenderIdentity,
    to: PhoneNumber,
    body: string,
    options: DeliveryOptions | undefined,
    signal?: AbortSignal
  ): Promise<TransportResult> {
    if (this.latencyMs > 0) {
      await new Promise((r) => setTimeout(r, this.latencyMs));
    }
    if (signal?.aborted) {
      return { ok: false, error: { code: 'aborted', message: 'Send aborted before hand-off' } };
    }

    const messageId = `local-${uuidv4()}`;
    this.log.info(
      {
        message_id: messageId,
        from: describeSender(sender),
        to: maskPhone(to.e164),
        length: body.length,
        media: options?.mediaUrls?.length ?? 0,
        scheduled: options?.scheduledSendTime?.toISOString(),
      },
      'SMS accepted (not delivered)'
    );

    return { ok: true, messageId };
  }
}
