import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from './logger';

/**
 * Call-level errors. These abort a whole dispatch before anything is sent;
 * per-recipient failures are reported in RecipientOutcome instead.
 */

export class SmsError extends Error {
  code: string;
  status: number;
  details?: Record<string, unknown>;

  constructor(code: string, message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SmsError';
    this.code = code;
    this.status = status;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type InvocationErrorCode =
  | 'empty_message'
  | 'no_recipients'
  | 'missing_sender'
  | 'ambiguous_sender'
  | 'invalid_sender';

export class InvocationError extends SmsError {
  declare code: InvocationErrorCode;

  constructor(code: InvocationErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, 400, details);
    this.name = 'InvocationError';
  }
}

export type OptionsErrorCode =
  | 'schedule_too_soon'
  | 'too_many_media'
  | 'insecure_or_invalid_media_url'
  | 'insecure_callback_url'
  | 'validity_out_of_range';

export class OptionsError extends SmsError {
  declare code: OptionsErrorCode;

  constructor(code: OptionsErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, 400, details);
    this.name = 'OptionsError';
  }
}

// express.json() failures: http-errors carrying a 4xx status and a `type`
const BODY_PARSER_ERRORS: Record<string, string> = {
  'entity.parse.failed': 'invalid_json',
  'entity.too.large': 'payload_too_large',
  'charset.unsupported': 'unsupported_charset',
  'encoding.unsupported': 'unsupported_encoding',
  'request.aborted': 'request_aborted',
  'request.size.invalid': 'request_size_invalid',
};

function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction) => {
  if (error instanceof ZodError) {
    return res.status(400).json({
      error: 'Validation error',
      details: error.errors,
    });
  }

  if (isBodyParserError(error)) {
    return res.status(error.status).json({ error: BODY_PARSER_ERRORS[error.type] ?? 'bad_request' });
  }

  if (error instanceof SmsError) {
    return res.status(error.status).json({
      error: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    });
  }

  logger.error({ err: error, path: req.path }, 'Unhandled error');
  res.status(500).json({
    error: 'internal_server_error',
  });
};
