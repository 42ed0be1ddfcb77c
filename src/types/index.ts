// src/types/index.ts

/**
 * Canonical phone number produced by the normalizer. Never built by hand.
 */
export interface PhoneNumber {
  /** E.164 form, e.g. "+15551234567" */
  readonly e164: string;
  readonly callingCode: string;
  readonly nationalNumber: string;
  /** Region whose numbering rules validated the number */
  readonly region: string;
}

export type NormalizationFailureReason =
  | 'empty'
  | 'too_short'
  | 'too_long'
  | 'invalid_characters'
  | 'unknown_region';

export interface NormalizationError {
  readonly reason: NormalizationFailureReason;
  readonly input: string;
  readonly message: string;
}

export type NormalizeResult =
  | { readonly ok: true; readonly phoneNumber: PhoneNumber }
  | { readonly ok: false; readonly error: NormalizationError };

export type SenderIdentity =
  | { readonly kind: 'number'; readonly number: PhoneNumber }
  | { readonly kind: 'service'; readonly serviceId: string };

export type UrlLike = string | URL;

export interface DeliveryOptions {
  /** Omit to send immediately */
  scheduledSendTime?: Date;
  /** Attaching media turns the message into an MMS */
  mediaUrls?: readonly UrlLike[];
  /** Overrides the provider-level status callback */
  statusCallbackUrl?: UrlLike;
  /** How long the provider may keep the message queued before failing it */
  validityPeriodSeconds?: number;
}

export interface RecipientOutcome {
  /** Recipient exactly as supplied by the caller */
  readonly phoneNumber: string;
  readonly normalizedNumber?: string;
  readonly success: boolean;
  readonly messageId?: string;
  readonly errorCode?: string;
  readonly errorMessage?: string;
}

export interface BatchResult {
  readonly sent: number;
  readonly failed: number;
  readonly results: readonly RecipientOutcome[];
  readonly cancelled: boolean;
}

export interface TransportError {
  code?: string;
  message: string;
}

export type TransportResult =
  | { ok: true; messageId: string }
  | { ok: false; error: TransportError };

/**
 * Carrier/provider call for one message. Implementations must tolerate
 * concurrent calls and should report provider failures as `{ ok: false }`.
 */
export interface SmsTransport {
  readonly name: string;
  send(
    sender: SenderIdentity,
    to: PhoneNumber,
    body: string,
    options: DeliveryOptions | undefined,
    signal?: AbortSignal
  ): Promise<TransportResult>;
}

export interface RegionRule {
  callingCode: string;
  minLength: number;
  maxLength: number;
  trunkPrefix?: string;
}
