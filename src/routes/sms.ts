/**
 * SMS Routes
 *
 * POST /send  single message from a number or a messaging service
 * POST /bulk  same message to many recipients, optionally validate-only
 */

import { Router, Response } from 'express';
import { z } from 'zod';
import type { SmsService } from '../services/smsService';

const MAX_BULK_RECIPIENTS = 10000;

const optionsSchema = z
  .object({
    scheduledSendTime: z
      .string()
      .datetime({ offset: true })
      .transform((v) => new Date(v))
      .optional(),
    mediaUrls: z.array(z.string()).optional(),
    statusCallbackUrl: z.string().optional(),
    validityPeriodSeconds: z.number().optional(),
  })
  .strict();

const sendSchema = z.object({
  to: z.string(),
  message: z.string(),
  from: z.string().optional(),
  serviceId: z.string().optional(),
  options: optionsSchema.optional(),
});

const bulkSchema = z.object({
  message: z.string(),
  phoneNumbers: z.array(z.string()).max(MAX_BULK_RECIPIENTS),
  from: z.string().optional(),
  serviceId: z.string().optional(),
  countryCode: z
    .string()
    .regex(/^[A-Za-z]{2}$/, 'must be an ISO 3166-1 alpha-2 code')
    .optional(),
  validateOnly: z.boolean().optional(),
  options: optionsSchema.optional(),
});

// Client went away before we answered: stop starting new sends.
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

export function createSmsRouter(smsService: SmsService): Router {
  const router = Router();

  router.post('/send', async (req, res, next) => {
    try {
      const body = sendSchema.parse(req.body);
      const outcome = await smsService.send({ ...body, signal: abortOnDisconnect(res) });
      res.status(outcome.success ? 200 : 422).json(outcome);
    } catch (error) {
      next(error);
    }
  });

  router.post('/bulk', async (req, res, next) => {
    try {
      const body = bulkSchema.parse(req.body);
      const result = await smsService.sendBulk({ ...body, signal: abortOnDisconnect(res) });
      res.status(200).json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
