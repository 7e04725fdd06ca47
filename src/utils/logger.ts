import chalk from "chalk";

class Logger {
  private debugEnabled = false;

  /** Enable or disable debug logging */
  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      console.log(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    console.log(chalk.blue(`[INFO] ${message}`), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`[ERROR] ${message}`), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`[SUCCESS] ${message}`), ...args);
  }

  /**
   * Log a curl command for an API request (debug only).
   * Query parameters named in `redact` are masked.
   */
  logCurl(
    method: string,
    url: string,
    headers?: Record<string, string>,
    redact: string[] = ["client", "apikey", "api_key"]
  ): void {
    if (!this.debugEnabled) return;

    let shown = url;
    try {
      const parsed = new URL(url);
      for (const key of redact) {
        if (parsed.searchParams.has(key)) {
          parsed.searchParams.set(key, "***");
        }
      }
      shown = parsed.toString();
    } catch {
      // not an absolute URL; print as given
    }

    let curl = `curl -X ${method} '${shown}'`;
    if (headers) {
      for (const [key, value] of Object.entries(headers)) {
        curl += ` \\\n  -H '${key}: ${value}'`;
      }
    }

    this.debug(`API Call:\n${curl}`);
  }
}

/** Global logger instance */
export const logger = new Logger();
