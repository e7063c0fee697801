/**
 * Typed error classes for the analysis pipeline
 *
 * Every fault is converted into a terminal record at the AnalysisManager
 * boundary; these classes carry what that conversion needs.
 */

import type { AnalysisStatus } from './types';

/**
 * Base error class for all analysis errors
 */
export class AnalyzerError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** URL being analyzed when the error occurred */
  readonly url?: string;

  constructor(message: string, options?: { code?: string; cause?: Error; url?: string }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'AnalyzerError';
    this.code = options?.code ?? 'ANALYZER_ERROR';
    this.url = options?.url;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a request cannot be mapped onto anything analyzable
 * (e.g. the URL does not parse)
 */
export class ResolutionError extends AnalyzerError {
  constructor(message: string, options?: { url?: string; cause?: Error }) {
    super(message, { code: 'RESOLUTION_FAILED', ...options });
    this.name = 'ResolutionError';
  }
}

export type ParseFormat = 'html' | 'feed' | 'json' | 'xml';

/**
 * Thrown when a payload cannot be parsed or yields no content
 */
export class ParseError extends AnalyzerError {
  /** Format the parser expected */
  readonly format: ParseFormat;

  constructor(message: string, options: { format: ParseFormat; url?: string; cause?: Error }) {
    super(message, { code: 'PARSE_FAILED', ...options });
    this.name = 'ParseError';
    this.format = options.format;
  }
}

/**
 * Thrown when an analysis exceeds its deadline
 */
export class AnalysisTimeoutError extends AnalyzerError {
  /** Deadline in milliseconds */
  readonly timeoutMs: number;

  constructor(message: string, options: { timeoutMs: number; url?: string }) {
    super(message, { code: 'ANALYSIS_TIMEOUT', ...options });
    this.name = 'AnalysisTimeoutError';
    this.timeoutMs = options.timeoutMs;
  }
}

/**
 * Thrown when the fetch capability fails or returns an unusable status
 */
export class TransportError extends AnalyzerError {
  /** HTTP status code if a response arrived */
  readonly statusCode?: number;
  /** Access was refused (401, 403, 451) */
  readonly blocked: boolean;

  constructor(message: string, options?: { url?: string; statusCode?: number; blocked?: boolean; cause?: Error }) {
    super(message, { code: 'TRANSPORT_FAILED', ...options });
    this.name = 'TransportError';
    this.statusCode = options?.statusCode;
    this.blocked = options?.blocked ?? false;
  }
}

/**
 * Thrown when a feed candidate or caller option fails validation
 */
export class ValidationError extends AnalyzerError {
  constructor(message: string, options?: { url?: string; cause?: Error }) {
    super(message, { code: 'VALIDATION_FAILED', ...options });
    this.name = 'ValidationError';
  }
}

/**
 * Type guard to check if an error is an AnalyzerError
 */
export function isAnalyzerError(error: unknown): error is AnalyzerError {
  return error instanceof AnalyzerError;
}

/**
 * Check if an error came from an aborted signal
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Wrap an unknown thrown value as an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Message suitable for a record's `errorMessage`
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

/**
 * Terminal status a thrown error maps onto
 */
export function statusForError(error: unknown): AnalysisStatus {
  if (error instanceof AnalysisTimeoutError) return 'timeout';
  if (error instanceof TransportError && error.blocked) return 'blocked';
  return 'error';
}
