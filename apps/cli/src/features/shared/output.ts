import pc from 'picocolors';

import { processIO, type CliIO } from './cli-io.js';
import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.js';
import { errorCodeFor } from './error-mapping.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

/**
 * Formats command results as human-readable text or machine-readable JSON.
 */
export class OutputManager {
  private readonly startTime: number = Date.now();

  constructor(
    private readonly format: OutputFormat = 'text',
    private readonly io: CliIO = processIO
  ) {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  /**
   * Emit a result: the JSON envelope in JSON mode, otherwise the rendered text lines.
   */
  success<T>(command: string, data: T, renderText: (data: T) => string[]): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, { duration_ms: Date.now() - this.startTime });
      this.io.stdout(JSON.stringify(response, undefined, 2));
      return;
    }

    for (const line of renderText(data)) {
      this.io.stdout(line);
    }
  }

  /**
   * Report a failure and set the exit code. JSON goes to stdout so callers can parse it.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): void {
    const code = errorCodeFor(error, exitCodeToErrorCode(exitCode));

    if (this.format === 'json') {
      this.io.stdout(JSON.stringify(createErrorResponse(command, error, code), undefined, 2));
    } else {
      this.io.stderr(`${pc.red('✗')} Error: ${error.message}`);
    }

    this.io.setExitCode(exitCode);
  }
}
