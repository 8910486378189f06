/**
 * Console logger for the ledger node
 */

export interface LoggerOptions {
  verbose?: boolean;
  scope?: string;
  silent?: boolean;
}

export class Logger {
  private verbose: boolean;
  private scope: string;
  private silent: boolean;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.scope = options.scope ?? 'ledger';
    this.silent = options.silent ?? false;
  }

  info(message: string): void {
    if (this.silent) return;
    console.log(`[${this.scope}] ${message}`);
  }

  warn(message: string): void {
    if (this.silent) return;
    console.warn(`[${this.scope}] ⚠️  ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (this.silent) return;
    if (error instanceof Error) {
      console.error(`[${this.scope}] ❌ ${message}: ${error.message}`);
      if (this.verbose && error.stack) {
        console.error(error.stack);
      }
      return;
    }
    console.error(`[${this.scope}] ❌ ${message}${error === undefined ? '' : `: ${String(error)}`}`);
  }

  success(message: string): void {
    if (this.silent) return;
    console.log(`[${this.scope}] ✓ ${message}`);
  }

  debug(message: string): void {
    if (this.silent || !this.verbose) return;
    console.log(`[${this.scope}:debug] ${message}`);
  }

  child(scope: string): Logger {
    return new Logger({ verbose: this.verbose, scope: `${this.scope}:${scope}`, silent: this.silent });
  }
}
