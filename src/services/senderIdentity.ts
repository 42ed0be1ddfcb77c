/**
 * Sender identity: exactly one of an originating number or a messaging
 * service id. The constructors below are the only way callers should build one.
 */

import type { SenderIdentity } from '../types';
import { InvocationError } from '../utils/errors';
import { maskPhone } from '../utils/logger';
import { normalizePhoneNumber } from './phoneNormalizer';

const E164_PATTERN = /^\+[1-9]\d{7,14}$/;

export function senderFromNumber(from: string, regionHint: string): SenderIdentity {
  const parsed = normalizePhoneNumber(from, regionHint);
  if (!parsed.ok) {
    throw new InvocationError('invalid_sender', `Invalid sender phone number: ${parsed.error.message}`, {
      reason: parsed.error.reason,
    });
  }
  const sender: SenderIdentity = { kind: 'number', number: parsed.phoneNumber };
  return Object.freeze(sender);
}

export function senderFromService(serviceId: string): SenderIdentity {
  const id = serviceId.trim();
  if (id.length === 0) {
    throw new InvocationError('missing_sender', 'Messaging service id is empty');
  }
  const sender: SenderIdentity = { kind: 'service', serviceId: id };
  return Object.freeze(sender);
}

function isSupplied(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Build a sender from the optional `from` / `serviceId` pair a bulk request
 * carries. Blank strings count as not supplied.
 */
export function resolveSender(
  params: { from?: string | null; serviceId?: string | null },
  regionHint: string
): SenderIdentity {
  const hasFrom = isSupplied(params.from);
  const hasService = isSupplied(params.serviceId);

  if (hasFrom && hasService) {
    throw new InvocationError('ambiguous_sender', 'Provide either "from" or "serviceId", not both');
  }
  if (isSupplied(params.serviceId)) {
    return senderFromService(params.serviceId);
  }
  if (isSupplied(params.from)) {
    return senderFromNumber(params.from, regionHint);
  }
  throw new InvocationError('missing_sender', 'Either "from" or "serviceId" is required');
}

/**
 * Runtime re-check for identities that did not come from the constructors
 * (plain objects from JavaScript callers or deserialized payloads).
 */
export function assertSenderIdentity(sender: SenderIdentity | null | undefined): asserts sender is SenderIdentity {
  if (!sender) {
    throw new InvocationError('missing_sender', 'Sender identity is required');
  }

  const hasNumber = 'number' in sender && sender.number !== undefined && sender.number !== null;
  const hasService = 'serviceId' in sender && isSupplied(sender.serviceId);

  if (hasNumber && hasService) {
    throw new InvocationError('ambiguous_sender', 'Sender identity has both a number and a service id');
  }
  if (!hasNumber && !hasService) {
    throw new InvocationError('missing_sender', 'Sender identity has neither a number nor a service id');
  }

  if (sender.kind === 'number') {
    if (!hasNumber || !E164_PATTERN.test(sender.number.e164)) {
      throw new InvocationError('invalid_sender', 'Sender number is not in E.164 format');
    }
  } else if (sender.kind !== 'service' || !hasService) {
    throw new InvocationError('missing_sender', 'Sender identity kind does not match its value');
  }
}

export function describeSender(sender: SenderIdentity): string {
  return sender.kind === 'number' ? maskPhone(sender.number.e164) : `service:${sender.serviceId}`;
}
