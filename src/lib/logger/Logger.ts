import { DEBUG_STORAGE_KEY, WIDGET_NAME } from '@/config/constants';

/**
 * Global debug flag - set from configuration or localStorage
 */
let DEBUG_ENABLED = false;

/**
 * Structured logger with context and runtime control
 */
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Set debug mode
   */
  static setDebugMode(enabled: boolean): void {
    DEBUG_ENABLED = enabled;
    console.log(`[${WIDGET_NAME}] Debug logging ${enabled ? 'enabled' : 'disabled'}`);
  }

  private get prefix(): string {
    return `[${WIDGET_NAME}:${this.context}]`;
  }

  /**
   * Debug message (only shown when debug enabled)
   */
  debug(message: string, ...meta: unknown[]): void {
    if (DEBUG_ENABLED) {
      console.debug(this.prefix, message, ...meta);
    }
  }

  /**
   * Info message (always shown)
   */
  info(message: string, ...meta: unknown[]): void {
    console.info(this.prefix, message, ...meta);
  }

  /**
   * Warning message (only shown when debug enabled)
   */
  warn(message: string, ...meta: unknown[]): void {
    if (DEBUG_ENABLED) {
      console.warn(this.prefix, message, ...meta);
    }
  }

  /**
   * Error message (always shown)
   */
  error(message: string, error?: unknown, ...meta: unknown[]): void {
    console.error(this.prefix, message, error, ...meta);

    // Log stack trace if available
    if (error instanceof Error && error.stack) {
      console.error(`Stack trace:`, error.stack);
    }
  }

  /**
   * Important message (always shown)
   */
  important(message: string, ...meta: unknown[]): void {
    console.log(`${this.prefix} IMPORTANT:`, message, ...meta);
  }
}

/**
 * Initialize debug mode from configuration, falling back to localStorage
 */
export function initializeLogger(configured = false): void {
  let fromStorage = false;
  try {
    fromStorage = window.localStorage.getItem(DEBUG_STORAGE_KEY) === 'true';
  } catch (error) {
    // Storage can be blocked by the browser's privacy settings
    console.error('Failed to read debug flag:', error);
  }
  Logger.setDebugMode(configured || fromStorage);
}
