import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { ErrorCode, isTrellisError, type TrellisError } from '@trellis/core';
import { openStorage, type StorageBackend } from '@trellis/storage';
import { SETTING_KEYS, createSettingsService } from './settings.js';

function catchError(fn: () => unknown): TrellisError {
  try {
    fn();
  } catch (error) {
    if (isTrellisError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('expected an error');
}

describe('SettingsService', () => {
  let backend: StorageBackend;

  beforeEach(() => {
    backend = openStorage({ path: ':memory:' });
  });

  afterEach(() => {
    backend.close();
  });

  test('stores JSON values by key', () => {
    const settings = createSettingsService(backend);

    settings.setSetting('theme', { dark: true });
    settings.setSetting('alpha', 1);

    expect(settings.getSetting('theme')?.value).toEqual({ dark: true });
    expect(settings.listSettings().map((s) => s.key)).toEqual(['alpha', 'theme']);
    expect(settings.deleteSetting('theme')).toBe(true);
    expect(settings.deleteSetting('theme')).toBe(false);
    expect(settings.getSetting('theme')).toBeUndefined();
  });

  test('falls back to the seed until control settings are stored', () => {
    const settings = createSettingsService(backend, {
      controllers: ['root'],
      authService: 'http://auth.local',
    });

    expect(settings.getControllers()).toEqual(['root']);
    expect(settings.getAuthService()).toBe('http://auth.local');

    settings.setAuthService('root', '  http://auth.internal  ');
    expect(settings.getAuthService()).toBe('http://auth.internal');
    expect(settings.getSetting(SETTING_KEYS.AUTH_SERVICE)?.value).toBe('http://auth.internal');
  });

  test('resetting the auth service restores the configured reference', () => {
    const settings = createSettingsService(backend, {
      controllers: ['root'],
      authService: 'http://auth.local',
    });
    settings.setAuthService('root', 'http://auth.internal');

    expect(catchError(() => settings.resetAuthService('mallory')).code).toBe(ErrorCode.NOT_CONTROLLER);
    expect(settings.resetAuthService('root')).toBe('http://auth.local');
    expect(settings.getSetting(SETTING_KEYS.AUTH_SERVICE)).toBeUndefined();
    expect(settings.resetAuthService('root')).toBe('http://auth.local');
  });

  test('only controllers change control settings', () => {
    const settings = createSettingsService(backend, { controllers: ['root'] });

    expect(catchError(() => settings.setAuthService('mallory', 'http://evil.local')).code).toBe(
      ErrorCode.NOT_CONTROLLER
    );
    expect(catchError(() => settings.setControllers('anonymous', ['anonymous'])).code).toBe(
      ErrorCode.AUTHENTICATION_REQUIRED
    );
    expect(settings.getAuthService()).toBeUndefined();

    expect(settings.setControllers('root', ['root', 'ops', 'root'])).toEqual(['root', 'ops']);
    settings.setControllers('ops', ['ops']);
    expect(settings.getControllers()).toEqual(['ops']);
    expect(catchError(() => settings.setAuthService('root', 'http://auth.local')).code).toBe(
      ErrorCode.NOT_CONTROLLER
    );
  });

  test('rejects malformed values', () => {
    const settings = createSettingsService(backend, { controllers: ['root'] });

    expect(catchError(() => settings.setAuthService('root', '   ')).code).toBe(ErrorCode.INVALID_INPUT);
    expect(catchError(() => settings.setControllers('root', ['root', 'not a principal'])).code).toBe(
      ErrorCode.INVALID_INPUT
    );
    expect(settings.getControllers()).toEqual(['root']);
  });
});
