import { readFileSync, writeFileSync, existsSync, rmSync } from 'node:fs';
import { createStore } from 'zustand/vanilla';
import { persist, createJSONStorage, type StateStorage } from 'zustand/middleware';
import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export const overlapStrategySchema = z.enum(['fail', 'prioritize-first', 'prioritize-last']);

export const settingsSchema = z.object({
  annotationIdPrefix: z.string().regex(/^[A-Za-z_][\w.-]*$/),
  timeSlotIdPrefix: z.string().regex(/^[A-Za-z_][\w.-]*$/),
  defaultLinguisticType: z.string().min(1),
  author: z.string(),
  allowNegativeTime: z.boolean(),
  overlapStrategy: overlapStrategySchema,
  logLevel: logLevelSchema,
});

export type Settings = z.infer<typeof settingsSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;
export type OverlapStrategy = z.infer<typeof overlapStrategySchema>;

export const DEFAULT_SETTINGS: Settings = {
  annotationIdPrefix: 'a',
  timeSlotIdPrefix: 'ts',
  defaultLinguisticType: 'default-lt',
  author: 'unspecified',
  allowNegativeTime: false,
  overlapStrategy: 'fail',
  logLevel: 'warn',
};

interface SettingsState extends Settings {
  /** Validates and applies a partial update. Throws a ZodError on invalid input. */
  configure: (update: Partial<Settings>) => void;
  reset: () => void;
}

/** Non-persistent storage, the default outside of a configured settings file */
export function memoryStorage(): StateStorage {
  const items = new Map<string, string>();
  return {
    getItem: (name) => items.get(name) ?? null,
    setItem: (name, value) => {
      items.set(name, value);
    },
    removeItem: (name) => {
      items.delete(name);
    },
  };
}

/** Persists the settings as JSON in a single file */
export function fileStorage(path: string): StateStorage {
  return {
    getItem: () => (existsSync(path) ? readFileSync(path, 'utf8') : null),
    setItem: (_name, value) => writeFileSync(path, value, 'utf8'),
    removeItem: () => rmSync(path, { force: true }),
  };
}

function pickSettings(state: Settings): Settings {
  const {
    annotationIdPrefix,
    timeSlotIdPrefix,
    defaultLinguisticType,
    author,
    allowNegativeTime,
    overlapStrategy,
    logLevel,
  } = state;
  return {
    annotationIdPrefix,
    timeSlotIdPrefix,
    defaultLinguisticType,
    author,
    allowNegativeTime,
    overlapStrategy,
    logLevel,
  };
}

export function createSettingsStore(storage: StateStorage = memoryStorage()) {
  return createStore<SettingsState>()(
    persist(
      (set) => ({
        ...DEFAULT_SETTINGS,

        configure: (update) => set(settingsSchema.partial().parse(update)),
        reset: () => set(DEFAULT_SETTINGS),
      }),
      {
        name: 'eafkit-settings',
        storage: createJSONStorage(() => storage),
        partialize: (state) => pickSettings(state),
        merge: (persisted, current) => {
          if (persisted === undefined) return current;
          const parsed = settingsSchema.partial().safeParse(persisted);
          if (!parsed.success) {
            console.warn('[eafkit] Ignoring invalid stored settings:', parsed.error.issues);
            return current;
          }
          return { ...current, ...parsed.data };
        },
      }
    )
  );
}

export const settingsStore = createSettingsStore();

export function getSettings(): Settings {
  return pickSettings(settingsStore.getState());
}

/** Validate and apply a partial update to the shared settings */
export function configureSettings(update: Partial<Settings>): Settings {
  settingsStore.getState().configure(update);
  return getSettings();
}

/** Switch the shared settings store to a JSON file and load what it holds. */
export async function loadSettingsFile(path: string): Promise<Settings> {
  settingsStore.persist.setOptions({ storage: createJSONStorage(() => fileStorage(path)) });
  await settingsStore.persist.rehydrate();
  return getSettings();
}
