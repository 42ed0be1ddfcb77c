/**
 * Dispatch Engine
 *
 * Validates a send request once, normalizes every recipient, then fans the
 * message out to the transport with a bounded number of calls in flight.
 * One recipient's failure (bad number, provider error, thrown exception) is
 * recorded in its own slot and never touches the others.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  BatchResult,
  DeliveryOptions,
  NormalizeResult,
  PhoneNumber,
  RecipientOutcome,
  SenderIdentity,
  SmsTransport,
} from '../types';
import { InvocationError } from '../utils/errors';
import { logger as rootLogger, maskPhone, type Logger } from '../utils/logger';
import { batchesCounter, dispatchDuration, messagesCounter } from '../observability/metrics';
import { normalizePhoneNumber } from './phoneNormalizer';
import { validateDeliveryOptions, type OptionsValidator } from './optionsValidator';
import { ResultAggregator } from './resultAggregator';
import { assertSenderIdentity, describeSender } from './senderIdentity';
import { runWithConcurrency } from './workerPool';

export const DEFAULT_MAX_CONCURRENCY = 10;
export const DEFAULT_REGION = 'US';

export interface DispatchRequest {
  message: string;
  recipients: readonly string[];
  sender: SenderIdentity;
  /** ISO 3166-1 alpha-2 region used for numbers not in international format */
  regionHint?: string;
  validateOnly?: boolean;
  options?: DeliveryOptions;
  signal?: AbortSignal;
}

export interface DispatchEngineConfig {
  transport: SmsTransport;
  maxConcurrency?: number;
  defaultRegion?: string;
  normalize?: (raw: string, regionHint: string) => NormalizeResult;
  validateOptions?: OptionsValidator;
  clock?: () => Date;
  logger?: Logger;
}

export function assertMessageAndRecipients(message: string, recipients: readonly string[]): void {
  if (typeof message !== 'string' || message.trim().length === 0) {
    throw new InvocationError('empty_message', 'Message body is required');
  }
  if (!Array.isArray(recipients) || recipients.length === 0) {
    throw new InvocationError('no_recipients', 'At least one recipient phone number is required');
  }
}

interface SendTarget {
  index: number;
  raw: string;
  phoneNumber: PhoneNumber;
}

export class DispatchEngine {
  private readonly transport: SmsTransport;
  private readonly maxConcurrency: number;
  private readonly defaultRegion: string;
  private readonly normalize: (raw: string, regionHint: string) => NormalizeResult;
  private readonly validateOptions: OptionsValidator;
  private readonly clock: () => Date;
  private readonly log: Logger;

  constructor(config: DispatchEngineConfig) {
    const maxConcurrency = config.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }

    this.transport = config.transport;
    this.maxConcurrency = maxConcurrency;
    this.defaultRegion = config.defaultRegion ?? DEFAULT_REGION;
    this.normalize = config.normalize ?? normalizePhoneNumber;
    this.validateOptions = config.validateOptions ?? validateDeliveryOptions;
    this.clock = config.clock ?? (() => new Date());
    this.log = (config.logger ?? rootLogger).child({ component: 'dispatch-engine', transport: this.transport.name });
  }

  /**
   * Rejects only for call-level problems (InvocationError, OptionsError).
   * Everything recipient-specific comes back inside the BatchResult.
   */
  async dispatch(request: DispatchRequest): Promise<BatchResult> {
    const startedAt = Date.now();
    const validateOnly = request.validateOnly ?? false;
    const mode = validateOnly ? 'validate' : 'send';
    const regionHint = request.regionHint ?? this.defaultRegion;
    const { message, recipients, sender, options, signal } = request;

    try {
      this.checkPreconditions(request);

      if (options) {
        const optionsError = this.validateOptions(options, this.clock());
        if (optionsError) throw optionsError;
      }
    } catch (error) {
      batchesCounter.inc({ mode, result: 'rejected' });
      this.log.warn({ error: error instanceof Error ? error.message : String(error), mode }, 'Dispatch rejected');
      throw error;
    }

    const batchId = uuidv4();
    const aggregator = new ResultAggregator(recipients.length);
    const targets: SendTarget[] = [];

    recipients.forEach((raw, index) => {
      const parsed = this.normalize(raw, regionHint);
      if (!parsed.ok) {
        messagesCounter.inc({ outcome: 'invalid_number' });
        aggregator.record(index, {
          phoneNumber: raw,
          success: false,
          errorCode: parsed.error.reason,
          errorMessage: parsed.error.message,
        });
        return;
      }

      if (validateOnly) {
        messagesCounter.inc({ outcome: 'validated' });
        aggregator.record(index, {
          phoneNumber: raw,
          normalizedNumber: parsed.phoneNumber.e164,
          success: true,
        });
        return;
      }

      targets.push({ index, raw, phoneNumber: parsed.phoneNumber });
    });

    if (validateOnly) {
      return this.finish(aggregator.build(false), { batchId, mode, startedAt, sender });
    }

    await runWithConcurrency(
      targets,
      this.maxConcurrency,
      async (target) => {
        const outcome = await this.sendOne(sender, target, message, options, signal);
        messagesCounter.inc({ outcome: outcome.success ? 'sent' : 'failed' });
        aggregator.record(target.index, outcome);
      },
      signal
    );

    for (const target of targets) {
      if (aggregator.isRecorded(target.index)) continue;
      messagesCounter.inc({ outcome: 'not_attempted' });
      aggregator.record(target.index, {
        phoneNumber: target.raw,
        normalizedNumber: target.phoneNumber.e164,
        success: false,
        errorCode: 'not_attempted',
        errorMessage: 'Dispatch was cancelled before this recipient was sent',
      });
    }

    const cancelled = signal?.aborted === true;
    return this.finish(aggregator.build(cancelled), { batchId, mode, startedAt, sender });
  }

  private checkPreconditions(request: DispatchRequest): void {
    assertMessageAndRecipients(request.message, request.recipients);
    assertSenderIdentity(request.sender);
  }

  private async sendOne(
    sender: SenderIdentity,
    target: SendTarget,
    message: string,
    options: DeliveryOptions | undefined,
    signal: AbortSignal | undefined
  ): Promise<RecipientOutcome> {
    const base = { phoneNumber: target.raw, normalizedNumber: target.phoneNumber.e164 };

    try {
      const result = await this.transport.send(sender, target.phoneNumber, message, options, signal);
      if (result.ok) {
        this.log.debug({ batch_index: target.index, message_id: result.messageId }, 'SMS sent');
        return { ...base, success: true, messageId: result.messageId };
      }

      this.log.warn(
        { phone: maskPhone(target.phoneNumber.e164), code: result.error.code, error: result.error.message },
        'SMS transport failure'
      );
      return {
        ...base,
        success: false,
        errorCode: result.error.code ?? 'transport_error',
        errorMessage: result.error.message,
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.log.error({ phone: maskPhone(target.phoneNumber.e164), error: errorMessage }, 'SMS transport threw');
      return { ...base, success: false, errorCode: 'transport_exception', errorMessage };
    }
  }

  private finish(
    result: BatchResult,
    ctx: { batchId: string; mode: 'send' | 'validate'; startedAt: number; sender: SenderIdentity }
  ): BatchResult {
    const durationMs = Date.now() - ctx.startedAt;
    batchesCounter.inc({ mode: ctx.mode, result: result.cancelled ? 'cancelled' : 'completed' });
    dispatchDuration.observe({ mode: ctx.mode }, durationMs);

    this.log.info(
      {
        batch_id: ctx.batchId,
        mode: ctx.mode,
        sender: describeSender(ctx.sender),
        recipients: result.results.length,
        sent: result.sent,
        failed: result.failed,
        cancelled: result.cancelled,
        duration_ms: durationMs,
      },
      'Dispatch completed'
    );

    return result;
  }
}
