import { settingsStore, type LogLevel } from '../stores/settings-store';

const TAG = '[eafkit]';

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return RANK[level] >= RANK[settingsStore.getState().logLevel];
}

export const log = {
  debug: (...args: unknown[]) => {
    if (enabled('debug')) console.debug(TAG, ...args);
  },
  info: (...args: unknown[]) => {
    if (enabled('info')) console.info(TAG, ...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled('warn')) console.warn(TAG, ...args);
  },
  error: (...args: unknown[]) => {
    if (enabled('error')) console.error(TAG, ...args);
  },
};
