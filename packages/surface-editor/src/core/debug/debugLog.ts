export type DebugLogLevel = 'error' | 'warn' | 'info' | 'verbose';

export type ContextMenuDebugConfig = {
  /** Highest level that reaches the console. `'off'` silences everything. */
  logLevel: DebugLogLevel | 'off';
};

const LEVEL_RANK: Record<DebugLogLevel | 'off', number> = {
  off: 0,
  error: 1,
  warn: 2,
  info: 3,
  verbose: 4,
};

let config: ContextMenuDebugConfig = { logLevel: 'off' };

export function getContextMenuDebugConfig(): ContextMenuDebugConfig {
  return config;
}

export function setContextMenuDebugConfig(next: Partial<ContextMenuDebugConfig>): void {
  config = { ...config, ...next };
}

/**
 * Writes a `[ContextMenu]`-prefixed line to the console when `level` is enabled.
 */
export function debugLog(level: DebugLogLevel, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] > LEVEL_RANK[config.logLevel]) return;
  const line = `[ContextMenu] ${message}`;
  const args: unknown[] = data === undefined ? [line] : [line, data];
  switch (level) {
    case 'error':
      console.error(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'info':
      console.info(...args);
      break;
    case 'verbose':
      console.debug(...args);
      break;
  }
}
