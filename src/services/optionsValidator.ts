/**
 * Delivery options validation
 *
 * Provider-independent bounds checked once per dispatch, before any number is
 * normalized or sent. Rules run in a fixed order and the first failure wins.
 */

import type { DeliveryOptions, UrlLike } from '../types';
import { OptionsError } from '../utils/errors';

export const OPTIONS_LIMITS = {
  minScheduleLeadMs: 5 * 60 * 1000,
  maxMediaUrls: 10,
  minValiditySeconds: 10,
  maxValiditySeconds: 10 * 60 * 60,
} as const;

const SECURE_SCHEME = 'https:';

function parseUrl(value: UrlLike): URL | null {
  if (value instanceof URL) return value;
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

export type OptionsValidator = (options: DeliveryOptions, now: Date) => OptionsError | null;

export const validateDeliveryOptions: OptionsValidator = (options, now) => {
  const { scheduledSendTime, mediaUrls, statusCallbackUrl, validityPeriodSeconds } = options;

  if (scheduledSendTime !== undefined) {
    const earliest = now.getTime() + OPTIONS_LIMITS.minScheduleLeadMs;
    const scheduledAt = scheduledSendTime.getTime();
    if (Number.isNaN(scheduledAt) || scheduledAt < earliest) {
      return new OptionsError(
        'schedule_too_soon',
        'scheduledSendTime must be at least 5 minutes in the future',
        { scheduledSendTime: Number.isNaN(scheduledAt) ? null : scheduledSendTime.toISOString() }
      );
    }
  }

  if (mediaUrls !== undefined) {
    if (mediaUrls.length > OPTIONS_LIMITS.maxMediaUrls) {
      return new OptionsError('too_many_media', `At most ${OPTIONS_LIMITS.maxMediaUrls} media URLs are allowed`, {
        count: mediaUrls.length,
      });
    }

    for (let i = 0; i < mediaUrls.length; i++) {
      const url = parseUrl(mediaUrls[i]);
      if (!url || url.protocol !== SECURE_SCHEME) {
        return new OptionsError('insecure_or_invalid_media_url', 'Media URLs must be absolute https URLs', {
          index: i,
        });
      }
    }
  }

  if (statusCallbackUrl !== undefined) {
    const url = parseUrl(statusCallbackUrl);
    if (!url || url.protocol !== SECURE_SCHEME) {
      return new OptionsError('insecure_callback_url', 'statusCallbackUrl must be an absolute https URL');
    }
  }

  if (validityPeriodSeconds !== undefined) {
    const inRange =
      validityPeriodSeconds >= OPTIONS_LIMITS.minValiditySeconds &&
      validityPeriodSeconds <= OPTIONS_LIMITS.maxValiditySeconds;
    if (!inRange) {
      return new OptionsError(
        'validity_out_of_range',
        `validityPeriodSeconds must be between ${OPTIONS_LIMITS.minValiditySeconds} and ${OPTIONS_LIMITS.maxValiditySeconds}`,
        { validityPeriodSeconds }
      );
    }
  }

  return null;
};
