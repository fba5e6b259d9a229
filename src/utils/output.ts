/**
 * Output manager for controlling console output verbosity
 *
 * Supports three levels:
 * - quiet: Only errors, warnings and dry-run previews
 * - normal: Errors, warnings and info (default)
 * - verbose: All output, including a line per renamed path
 */

export type OutputLevel = 'quiet' | 'normal' | 'verbose';

/**
 * Destination for report lines (the console, or a collector in tests)
 */
export interface OutputSink {
  info(message: string): void;
  result(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  verbose(message: string): void;
}

export class OutputManager implements OutputSink {
  private static instance: OutputManager | null = null;
  private level: OutputLevel = 'normal';

  private constructor() {
    // Check environment variables
    if (process.env.PATHCASE_QUIET === '1') {
      this.level = 'quiet';
    } else if (process.env.PATHCASE_VERBOSE === '1') {
      this.level = 'verbose';
    }
  }

  static getInstance(): OutputManager {
    if (!OutputManager.instance) {
      OutputManager.instance = new OutputManager();
    }
    return OutputManager.instance;
  }

  /**
   * Set output level (CLI flags override environment variables)
   */
  setLevel(level: OutputLevel): void {
    this.level = level;
  }

  getLevel(): OutputLevel {
    return this.level;
  }

  /**
   * Info message - shown in normal and verbose modes
   */
  info(message: string): void {
    if (this.level !== 'quiet') {
      console.log(message);
    }
  }

  /**
   * Result line - always shown, even in quiet mode
   */
  result(message: string): void {
    console.log(message);
  }

  /**
   * Warning message - always shown
   */
  warn(message: string): void {
    console.warn(message);
  }

  /**
   * Error message - always shown
   */
  error(message: string): void {
    console.error(message);
  }

  /**
   * Only shown in verbose mode
   */
  verbose(message: string): void {
    if (this.level === 'verbose') {
      console.log(message);
    }
  }
}

// Export singleton instance
export const output = OutputManager.getInstance();
