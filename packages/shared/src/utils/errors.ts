import type { CaptureFailureCode, MetricName } from '../types/records.js';

export class MonitorError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MonitorError';
    this.code = code;
  }
}

export type CaptureErrorCode = CaptureFailureCode | 'CAPTURE_CANCELLED';

export class CaptureError extends MonitorError {
  declare readonly code: CaptureErrorCode;

  constructor(message: string, code: CaptureErrorCode, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'CaptureError';
  }
}

export class CaptureToolUnavailableError extends CaptureError {
  constructor(tool: string, reason: string, options?: { cause?: unknown }) {
    super(`Capture tool unavailable (${tool}): ${reason}`, 'CAPTURE_TOOL_UNAVAILABLE', options);
    this.name = 'CaptureToolUnavailableError';
  }
}

export class CaptureTimeoutError extends CaptureError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Capture did not finish within ${timeoutMs}ms`, 'CAPTURE_TIMEOUT');
    this.name = 'CaptureTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class CaptureCancelledError extends CaptureError {
  constructor() {
    super('Capture was cancelled', 'CAPTURE_CANCELLED');
    this.name = 'CaptureCancelledError';
  }
}

export class MetricUnavailableError extends MonitorError {
  public readonly metric: MetricName;

  constructor(metric: MetricName, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Metric unavailable: ${metric}${reason}`, 'METRIC_UNAVAILABLE', options);
    this.name = 'MetricUnavailableError';
    this.metric = metric;
  }
}

export class SamplerTimeoutError extends MonitorError {
  constructor(timeoutMs: number) {
    super(`System sampler did not finish within ${timeoutMs}ms`, 'SAMPLER_TIMEOUT');
    this.name = 'SamplerTimeoutError';
  }
}

export class StoreError extends MonitorError {
  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'StoreError';
  }
}

export class StoreWriteError extends StoreError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Metric store write failed: ${operation}${causeSuffix(options)}`, 'STORE_WRITE_FAILED', options);
    this.name = 'StoreWriteError';
  }
}

export class StoreReadError extends StoreError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Metric store read failed: ${operation}${causeSuffix(options)}`, 'STORE_READ_FAILED', options);
    this.name = 'StoreReadError';
  }
}

export class StoreCorruptionError extends StoreError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Metric store is corrupt: ${operation}${causeSuffix(options)}`, 'STORE_CORRUPTION', options);
    this.name = 'StoreCorruptionError';
  }
}

export class ConfigValidationError extends MonitorError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

function causeSuffix(options?: { cause?: unknown }): string {
  return options?.cause instanceof Error ? ` (${options.cause.message})` : '';
}
