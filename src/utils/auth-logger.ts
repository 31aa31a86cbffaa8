// Utility: Structured logger for auth and session events

export interface LogContext {
  [key: string]: string | number | boolean | undefined;
}

/**
 * One JSON line per event, prefixed so it can be grepped out of the server log
 */
export class AuthLogger {
  constructor(private component: string) {}

  private log(level: string, message: string, context?: LogContext): void {
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...context,
    };
    const line = `[AUTH] ${JSON.stringify(entry)}`;
    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }
}

export const authLogger = new AuthLogger('Auth');
