/**
 * Error formatting utilities for user-friendly error messages
 */

import {
  AuthorizationError,
  CatalogApiError,
  MalformedRecordError,
  RateLimitExceededError,
  SnapshotReadError,
  TransientCallFailedError
} from '../errors.js';

interface FormattedError {
  message: string;
  suggestion?: string;
  technical?: string;
}

/**
 * Format error for user display with context and suggestions
 */
export function formatUserError(error: unknown, context: string): string {
  const formatted = parseError(error, context);

  let message = formatted.message;

  if (formatted.suggestion) {
    message += ` | Suggestion: ${formatted.suggestion}`;
  }

  if (formatted.technical) {
    message += ` | Technical: ${formatted.technical}`;
  }

  return message;
}

/**
 * Parse error and provide user-friendly message with context
 */
function parseError(error: unknown, context: string): FormattedError {
  const errorStr = error instanceof Error ? error.message : String(error);

  if (error instanceof AuthorizationError) {
    return {
      message: `Authentication failed while ${context}`,
      suggestion: 'Check the credentials in .env. Tokens may have expired; obtain new ones and retry.',
      technical: shortenMessage(errorStr)
    };
  }

  if (error instanceof MalformedRecordError) {
    return {
      message: `Snapshot file is invalid (${errorStr})`,
      suggestion: 'Fix the row in the CSV file or re-export it. Column order must match the header written by export.'
    };
  }

  if (error instanceof SnapshotReadError) {
    return {
      message: `Cannot read snapshot while ${context}`,
      suggestion: 'Check the file path and permissions, or run export first.',
      technical: error.path
    };
  }

  if (error instanceof RateLimitExceededError) {
    return {
      message: `Rate limited while ${context}`,
      suggestion: 'API rate limit reached. Wait a few minutes before retrying.',
      technical: shortenMessage(errorStr)
    };
  }

  if (error instanceof TransientCallFailedError || isNetworkError(error)) {
    return {
      message: `Network error while ${context}`,
      suggestion: 'Check your connection. The service may be temporarily unavailable.',
      technical: shortenMessage(errorStr)
    };
  }

  // Generic error
  return {
    message: `Error ${context}: ${shortenMessage(errorStr)}`,
    suggestion: 'Check logs for details. If persistent, report issue with error details.'
  };
}

function isNetworkError(error: unknown): boolean {
  return error instanceof CatalogApiError && error.code !== undefined;
}

/**
 * Shorten long error messages
 */
function shortenMessage(msg: string): string {
  const maxLength = 150;
  const firstLine = msg.split('\n')[0];
  if (firstLine.length <= maxLength) {
    return firstLine;
  }
  return firstLine.substring(0, maxLength) + '...';
}
