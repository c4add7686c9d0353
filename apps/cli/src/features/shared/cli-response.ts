import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Standardized CLI response format for --json output.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;
  /** ISO 8601 */
  timestamp: string;
  data?: T;
  error?:
    | {
        /** Machine-readable error code */
        code: string;
        message: string;
        details?: unknown;
      }
    | undefined;
  metadata?: Record<string, unknown> | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: Record<string, unknown>): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(command: string, error: Error, code: string, details?: unknown): CLIResponse<never> {
  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: details === undefined ? { code, message: error.message } : { code, message: error.message, details },
  };
}

const EXIT_CODE_NAMES = new Map<number, string>(Object.entries(ExitCodes).map(([name, code]) => [code, name]));

export function exitCodeToErrorCode(exitCode: ExitCode): string {
  return EXIT_CODE_NAMES.get(exitCode) ?? 'GENERAL_ERROR';
}
