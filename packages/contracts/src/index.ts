// API envelope types and schemas
export {
  successEnvelopeSchema,
  errorEnvelopeSchema,
  tokenPairSchema,
  type SuccessEnvelope,
  type ErrorEnvelope,
  type TokenPair,
} from './envelope.js';

// Standard error codes
export { ErrorCodes, type ErrorCode } from './error-codes.js';
