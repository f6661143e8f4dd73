// =============================================================================
// VAULTLINE — Console Logging
//
// Tagged console output ("[Upload] ...") filtered by LOG_LEVEL. Never pass
// plaintext names, keys or metadata; UUIDs and counts only.
// =============================================================================

import { config } from '../config';

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 } as const;
type Level = Exclude<keyof typeof LEVELS, 'silent'>;

function isLevelName(value: string): value is keyof typeof LEVELS {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function threshold(): number {
  const configured = config.logging.level;
  return isLevelName(configured) ? LEVELS[configured] : LEVELS.info;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(tag: string): Logger {
  const emit = (level: Level, message: string): void => {
    if (LEVELS[level] < threshold()) return;
    const line = `[${tag}] ${message}`;
    switch (level) {
      case 'debug':
      case 'info':
        console.log(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  };

  return {
    debug: message => emit('debug', message),
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
  };
}
