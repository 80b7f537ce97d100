export {
  CORRELATION_HEADER,
  correlationContext,
  correlationMiddleware,
  correlationStorage,
  getCorrelationId,
} from './correlation.js';
