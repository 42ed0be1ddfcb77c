export * from './types';
export { SmsError, InvocationError, OptionsError } from './utils/errors';
export type { InvocationErrorCode, OptionsErrorCode } from './utils/errors';
export { normalizePhoneNumber, isSupportedRegion, supportedRegions } from './services/phoneNormalizer';
export { validateDeliveryOptions, OPTIONS_LIMITS } from './services/optionsValidator';
export type { OptionsValidator } from './services/optionsValidator';
export { ResultAggregator, summarizeOutcomes } from './services/resultAggregator';
export { runWithConcurrency } from './services/workerPool';
export {
  senderFromNumber,
  senderFromService,
  resolveSender,
  assertSenderIdentity,
} from './services/senderIdentity';
export {
  DispatchEngine,
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_REGION,
} from './services/dispatchEngine';
export type { DispatchRequest, DispatchEngineConfig } from './services/dispatchEngine';
export { SmsService } from './services/smsService';
export type { BulkSendRequest, SingleSendRequest } from './services/smsService';
export { LogOnlyTransport } from './providers/logOnlyTransport';
export { createApp } from './server';
export { loadConfig } from './config';
export type { AppConfig } from './config';
