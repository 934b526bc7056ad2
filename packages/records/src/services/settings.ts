/**
 * Settings Service
 *
 * Server-side key-value settings persisted to SQLite. Holds the control
 * settings: the auth-service reference and the controller principals allowed
 * to change it. Values are stored in the `settings` table as JSON.
 */

import { invalidInput, isValidPrincipalId } from '@trellis/core';
import type { StorageBackend } from '@trellis/storage';
import { requireController } from '../systems/identity.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('settings');

// ============================================================================
// Types
// ============================================================================

/**
 * A setting stored in the database
 */
export interface Setting {
  key: string;
  value: unknown;
  updatedAt: string;
}

/**
 * Well-known setting keys
 */
export const SETTING_KEYS = {
  AUTH_SERVICE: 'authService',
  CONTROLLERS: 'controllers',
} as const;

/**
 * Values used while the settings table holds no control settings
 */
export interface SettingsSeed {
  controllers: string[];
  authService?: string;
}

// ============================================================================
// Interface
// ============================================================================

export interface SettingsService {
  getSetting(key: string): Setting | undefined;

  /**
   * Set a setting (upsert)
   */
  setSetting(key: string, value: unknown): Setting;

  /**
   * @returns true if the setting existed and was deleted
   */
  deleteSetting(key: string): boolean;

  /** Every stored setting, by key */
  listSettings(): Setting[];

  /**
   * Current auth-service reference, if one is set
   */
  getAuthService(): string | undefined;

  /**
   * @throws IdentityError NOT_CONTROLLER when the caller is not a controller
   */
  setAuthService(caller: string, reference: string): string;

  /**
   * Drops the stored reference; the configured one applies again
   * @returns the reference now in effect
   */
  resetAuthService(caller: string): string | undefined;

  getControllers(): string[];

  /**
   * Replaces the controller list; the caller must be a current controller
   */
  setControllers(caller: string, controllers: string[]): string[];
}

// ============================================================================
// Database Row Type
// ============================================================================

interface DbSetting {
  [key: string]: unknown;
  key: string;
  value: string;
  updated_at: string;
}

// ============================================================================
// Implementation
// ============================================================================

function dbToSetting(row: DbSetting): Setting {
  let parsedValue: unknown;
  try {
    parsedValue = JSON.parse(row.value);
  } catch {
    parsedValue = row.value;
  }

  return {
    key: row.key,
    value: parsedValue,
    updatedAt: row.updated_at,
  };
}

function validateReference(reference: unknown): string {
  if (typeof reference !== 'string' || reference.trim().length === 0) {
    throw invalidInput('authService', reference, 'non-empty service reference');
  }
  return reference.trim();
}

function validateControllers(value: unknown): string[] {
  if (!Array.isArray(value)) {
    throw invalidInput('controllers', value, 'list of principal ids');
  }
  const controllers: string[] = [];
  for (const entry of value) {
    if (!isValidPrincipalId(entry)) {
      throw invalidInput('controllers', entry, 'valid principal id');
    }
    if (!controllers.includes(entry)) {
      controllers.push(entry);
    }
  }
  return controllers;
}

export function createSettingsService(storage: StorageBackend, seed: SettingsSeed = { controllers: [] }): SettingsService {
  return {
    getSetting(key: string): Setting | undefined {
      const row = storage.queryOne<DbSetting>(
        'SELECT key, value, updated_at FROM settings WHERE key = ?',
        [key]
      );
      if (!row) return undefined;
      return dbToSetting(row);
    },

    setSetting(key: string, value: unknown): Setting {
      const jsonValue = JSON.stringify(value);
      const updatedAt = new Date().toISOString();

      storage.run(
        'INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at',
        [key, jsonValue, updatedAt]
      );

      logger.debug(`Setting updated: ${key}`);

      return {
        key,
        value,
        updatedAt,
      };
    },

    deleteSetting(key: string): boolean {
      const result = storage.run('DELETE FROM settings WHERE key = ?', [key]);
      return result.changes > 0;
    },

    listSettings(): Setting[] {
      return storage
        .query<DbSetting>('SELECT key, value, updated_at FROM settings ORDER BY key ASC')
        .map(dbToSetting);
    },

    getAuthService(): string | undefined {
      const setting = this.getSetting(SETTING_KEYS.AUTH_SERVICE);
      if (!setting) {
        return seed.authService;
      }
      return typeof setting.value === 'string' ? setting.value : undefined;
    },

    setAuthService(caller: string, reference: string): string {
      const controller = requireController(this.getControllers(), caller);
      const validated = validateReference(reference);
      this.setSetting(SETTING_KEYS.AUTH_SERVICE, validated);
      logger.info(`Auth service set to ${validated} by ${controller}`);
      return validated;
    },

    resetAuthService(caller: string): string | undefined {
      const controller = requireController(this.getControllers(), caller);
      if (this.deleteSetting(SETTING_KEYS.AUTH_SERVICE)) {
        logger.info(`Auth service reset to its configured value by ${controller}`);
      }
      return this.getAuthService();
    },

    getControllers(): string[] {
      const setting = this.getSetting(SETTING_KEYS.CONTROLLERS);
      if (!setting || !Array.isArray(setting.value)) {
        return [...seed.controllers];
      }
      const stored: unknown[] = setting.value;
      return stored.filter((entry): entry is string => typeof entry === 'string');
    },

    setControllers(caller: string, controllers: string[]): string[] {
      const controller = requireController(this.getControllers(), caller);
      const validated = validateControllers(controllers);
      this.setSetting(SETTING_KEYS.CONTROLLERS, validated);
      logger.info(`Controllers replaced by ${controller} (${validated.length} principal(s))`);
      return validated;
    },
  };
}
