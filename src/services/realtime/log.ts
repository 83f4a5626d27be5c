export type RealtimeLogLevel = 'debug' | 'info' | 'warn' | 'error';
export type RealtimeLogContext = Record<string, unknown>;

/** Same shape as the gateway logger: an UPPER_SNAKE event plus context. */
export type RealtimeLog = (level: RealtimeLogLevel, event: string, context?: RealtimeLogContext) => void;

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export const consoleRealtimeLog: RealtimeLog = (level, event, context = {}) => {
  const line = `[Realtime] ${event}`;
  switch (level) {
    case 'debug':
      console.debug(line, context);
      return;
    case 'info':
      console.log(line, context);
      return;
    case 'warn':
      console.warn(line, context);
      return;
    case 'error':
      console.error(line, context);
      return;
  }
};
