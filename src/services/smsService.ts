/**
 * SMS Service
 *
 * Public entry points: single sends from a number or through a messaging
 * service, and bulk sends (optionally validate-only). Single sends are bulk
 * sends of one recipient with the outcome unwrapped.
 */

import type { BatchResult, DeliveryOptions, RecipientOutcome, SenderIdentity } from '../types';
import { assertMessageAndRecipients, DispatchEngine } from './dispatchEngine';
import { resolveSender, senderFromNumber, senderFromService } from './senderIdentity';

export interface BulkSendRequest {
  message: string;
  phoneNumbers: readonly string[];
  from?: string | null;
  serviceId?: string | null;
  /** ISO 3166-1 alpha-2 code for numbers not in international format */
  countryCode?: string;
  validateOnly?: boolean;
  options?: DeliveryOptions;
  signal?: AbortSignal;
}

export interface SingleSendRequest {
  to: string;
  message: string;
  from?: string | null;
  serviceId?: string | null;
  options?: DeliveryOptions;
  signal?: AbortSignal;
}

export class SmsService {
  constructor(
    private readonly engine: DispatchEngine,
    private readonly defaultRegion: string = 'US'
  ) {}

  async sendFrom(
    from: string,
    to: string,
    message: string,
    options?: DeliveryOptions,
    signal?: AbortSignal
  ): Promise<RecipientOutcome> {
    assertMessageAndRecipients(message, [to]);
    return this.sendSingle(senderFromNumber(from, this.defaultRegion), to, message, options, signal);
  }

  async sendViaService(
    serviceId: string,
    to: string,
    message: string,
    options?: DeliveryOptions,
    signal?: AbortSignal
  ): Promise<RecipientOutcome> {
    assertMessageAndRecipients(message, [to]);
    return this.sendSingle(senderFromService(serviceId), to, message, options, signal);
  }

  /** Single send where the sender comes from an optional `from` / `serviceId` pair. */
  async send(request: SingleSendRequest): Promise<RecipientOutcome> {
    assertMessageAndRecipients(request.message, [request.to]);
    const sender = resolveSender({ from: request.from, serviceId: request.serviceId }, this.defaultRegion);
    return this.sendSingle(sender, request.to, request.message, request.options, request.signal);
  }

  /**
   * Same message to many recipients. Exactly one of `from` / `serviceId`
   * must be given; invalid numbers are reported per recipient and never
   * block the others.
   */
  async sendBulk(request: BulkSendRequest): Promise<BatchResult> {
    assertMessageAndRecipients(request.message, request.phoneNumbers);
    const regionHint = request.countryCode ?? this.defaultRegion;
    const sender = resolveSender({ from: request.from, serviceId: request.serviceId }, regionHint);

    return this.engine.dispatch({
      message: request.message,
      recipients: request.phoneNumbers,
      sender,
      regionHint,
      validateOnly: request.validateOnly ?? false,
      options: request.options,
      signal: request.signal,
    });
  }

  private async sendSingle(
    sender: SenderIdentity,
    to: string,
    message: string,
    options: DeliveryOptions | undefined,
    signal: AbortSignal | undefined
  ): Promise<RecipientOutcome> {
    const result = await this.engine.dispatch({
      message,
      recipients: [to],
      sender,
      regionHint: this.defaultRegion,
      validateOnly: false,
      options,
      signal,
    });

    const [outcome] = result.results;
    if (!outcome) {
      throw new Error('Dispatch returned no outcome for a single recipient');
    }
    return outcome;
  }
}
