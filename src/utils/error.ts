import { ZodError } from 'zod';
import { AppLinksError, Outcome } from '../types.js';

// Format error for MCP response
export function formatErrorForResponse(error: unknown): string {
  if (error instanceof AppLinksError) {
    let message = `${error.code}: ${error.message}`;

    if (error.suggestion) {
      message += `\n\nSuggestion: ${error.suggestion}`;
    }

    return message;
  }

  if (error instanceof ZodError) {
    const problems = error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return `INVALID_ARGUMENTS: ${problems.join('; ')}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

// Check if an error is recoverable
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof AppLinksError) {
    switch (error.code) {
      case 'ADB_NOT_FOUND':
      case 'NO_DEVICES_FOUND':
      case 'DEVICE_NOT_FOUND':
      case 'DEVICE_NOT_AVAILABLE':
      case 'PACKAGE_NOT_FOUND':
      case 'INVALID_PACKAGE_NAME':
      case 'INVALID_CONFIGURATION':
        return false; // These require user action
      default:
        return true;
    }
  }

  return false;
}

// Get user-friendly error message
export function getUserFriendlyErrorMessage(error: unknown): string {
  if (error instanceof AppLinksError) {
    return error.message;
  }

  return 'An unexpected error occurred';
}

export function unwrapOutcome<T>(outcome: Outcome<T>): T {
  if (!outcome.success) {
    throw outcome.error;
  }

  return outcome.value;
}
