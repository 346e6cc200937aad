/**
 * Centralized error handling for the delivery layer
 * Gives every failure a code, a severity and a retry hint, and logs it once.
 */

import { incrementCounter } from './metrics';
import type { DeliveryLogger } from './types';

export type DeliveryErrorCode =
  | 'LOG_APPEND_FAILED'
  | 'LOG_READ_FAILED'
  | 'SYNC_STATE_READ_FAILED'
  | 'SYNC_STATE_WRITE_FAILED'
  | 'CATCH_UP_FAILED'
  | 'TRANSPORT_SEND_FAILED'
  | 'SLOW_CONSUMER'
  | 'CONFIG_ERROR';

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export type ErrorContext = {
  component: string;
  action?: string;
  conversationId?: string;
  userId?: string;
  clientId?: string;
  [key: string]: unknown;
};

export class DeliveryError extends Error {
  code?: DeliveryErrorCode;
  context?: ErrorContext;
  severity?: ErrorSeverity;
  retryable?: boolean;

  constructor(message: string, options: { code?: DeliveryErrorCode; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'DeliveryError';
    this.code = options.code;
  }
}

const NON_RETRYABLE: ReadonlySet<DeliveryErrorCode> = new Set<DeliveryErrorCode>(['CONFIG_ERROR']);

class DeliveryErrorHandler {
  private static instance: DeliveryErrorHandler | null = null;
  private logger: DeliveryLogger = console;

  static getInstance(): DeliveryErrorHandler {
    if (!DeliveryErrorHandler.instance) {
      DeliveryErrorHandler.instance = new DeliveryErrorHandler();
    }
    return DeliveryErrorHandler.instance;
  }

  setLogger(logger: DeliveryLogger): void {
    this.logger = logger;
  }

  handle(error: unknown, context: ErrorContext): DeliveryError {
    const deliveryError = this.normalizeError(error, context);
    this.logError(deliveryError);
    incrementCounter('delivery.errors');
    incrementCounter('delivery.errors.by_code', { code: deliveryError.code ?? 'UNKNOWN' });
    return deliveryError;
  }

  normalizeError(error: unknown, context: ErrorContext): DeliveryError {
    let deliveryError: DeliveryError;
    if (error instanceof DeliveryError) {
      deliveryError = error;
    } else if (error instanceof Error) {
      deliveryError = new DeliveryError(error.message, { cause: error });
      deliveryError.stack = error.stack;
    } else {
      deliveryError = new DeliveryError(String(error));
    }

    deliveryError.context = {
      ...(deliveryError.context ?? {}),
      ...context,
    };

    if (!deliveryError.severity) {
      deliveryError.severity = this.inferSeverity(deliveryError);
    }
    if (deliveryError.retryable === undefined) {
      deliveryError.retryable = this.isRetryable(deliveryError);
    }
    return deliveryError;
  }

  private inferSeverity(error: DeliveryError): ErrorSeverity {
    switch (error.code) {
      case 'CONFIG_ERROR':
        return 'critical';
      case 'CATCH_UP_FAILED':
      case 'LOG_APPEND_FAILED':
      case 'LOG_READ_FAILED':
        return 'high';
      case 'SYNC_STATE_READ_FAILED':
      case 'SYNC_STATE_WRITE_FAILED':
      case 'SLOW_CONSUMER':
      case 'TRANSPORT_SEND_FAILED':
        return 'medium';
      default:
        return 'low';
    }
  }

  private isRetryable(error: DeliveryError): boolean {
    if (error.code && NON_RETRYABLE.has(error.code)) {
      return false;
    }
    // Store and transport failures clear up on the next tick or reconnect
    return true;
  }

  private logError(error: DeliveryError): void {
    const context = error.context ?? { component: 'unknown' };
    const logMessage = `[Delivery Error] ${context.component}: ${error.message}`;
    const logData = {
      code: error.code,
      severity: error.severity,
      retryable: error.retryable,
      context,
      cause: error.cause,
    };

    switch (error.severity) {
      case 'critical':
      case 'high':
        this.logger.error(logMessage, logData);
        break;
      case 'medium':
        this.logger.warn(logMessage, logData);
        break;
      default:
        this.logger.log(logMessage, logData);
    }
  }
}

export const deliveryErrorHandler = DeliveryErrorHandler.getInstance();

export function handleDeliveryError(error: unknown, context: ErrorContext): DeliveryError {
  return deliveryErrorHandler.handle(error, context);
}

export function createDeliveryError(
  message: string,
  code: DeliveryErrorCode,
  options: { cause?: unknown; context?: ErrorContext; severity?: ErrorSeverity } = {}
): DeliveryError {
  const error = new DeliveryError(message, { code, cause: options.cause });
  error.context = options.context;
  error.severity = options.severity;
  return error;
}

export function setErrorLogger(logger: DeliveryLogger): void {
  deliveryErrorHandler.setLogger(logger);
}
