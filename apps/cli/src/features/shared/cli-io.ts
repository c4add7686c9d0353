import type { ExitCode } from './exit-codes.js';

/**
 * Where commands write and how they report their exit status.
 * Commands never call process.exit; the entry point applies the exit code.
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  setExitCode(code: ExitCode): void;
}

export const processIO: CliIO = {
  stdout(text) {
    process.stdout.write(`${text}\n`);
  },
  stderr(text) {
    process.stderr.write(`${text}\n`);
  },
  setExitCode(code) {
    process.exitCode = code;
  },
};
