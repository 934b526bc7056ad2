import { describe, expect, test } from 'vitest';
import {
  CaptureType,
  ErrorCode,
  RecordKind,
  TemplateKind,
  Visibility,
  asPrincipalId,
  asRecordId,
  isTrellisError,
  type Capture,
  type Template,
  type TrellisError,
} from '@trellis/core';
import {
  PrincipalSource,
  isReadableBy,
  requireAuthenticated,
  requireController,
  requireOwned,
  resolvePrincipal,
  type AuthService,
  type AuthServiceResolver,
} from './identity.js';

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

async function catchAsync(promise: Promise<unknown>): Promise<TrellisError> {
  try {
    await promise;
  } catch (error) {
    if (isTrellisError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('expected an error');
}

const AUTH_URL = 'http://auth.test';

const fakeAuthService: AuthService = {
  async validateAccessToken(accessToken: string): Promise<string> {
    if (accessToken === 'test-secret') {
      return 'alice';
    }
    if (accessToken === 'anonymous-token') {
      return 'anonymous';
    }
    throw new Error('token expired');
  },
};

const resolveAuthService: AuthServiceResolver = (reference) =>
  reference === AUTH_URL ? fakeAuthService : undefined;

describe('requireAuthenticated', () => {
  test('accepts well-formed principals', () => {
    expect(requireAuthenticated('alice@example.org')).toBe('alice@example.org');
  });

  test('rejects missing, anonymous and malformed callers', () => {
    for (const caller of [undefined, null, '', 'anonymous', 'has space']) {
      expect(catchError(() => requireAuthenticated(caller)).code).toBe(ErrorCode.AUTHENTICATION_REQUIRED);
    }
  });
});

describe('resolvePrincipal', () => {
  test('a bearer token is validated by the auth service', async () => {
    const context = await resolvePrincipal({
      authorization: 'Bearer test-secret',
      principalHeader: 'mallory',
      trustPrincipalHeader: true,
      authServiceReference: AUTH_URL,
      resolveAuthService,
    });

    expect(context).toEqual({ principal: 'alice', source: PrincipalSource.TOKEN, verified: true });
  });

  test('token failures map to identity errors', async () => {
    const base = { trustPrincipalHeader: false, resolveAuthService };

    expect(
      (await catchAsync(resolvePrincipal({ ...base, authorization: 'Bearer stale', authServiceReference: AUTH_URL })))
        .code
    ).toBe(ErrorCode.INVALID_ACCESS_TOKEN);
    expect(
      (await catchAsync(resolvePrincipal({ ...base, authorization: 'Bearer anonymous-token', authServiceReference: AUTH_URL })))
        .code
    ).toBe(ErrorCode.AUTHENTICATION_REQUIRED);
    expect((await catchAsync(resolvePrincipal({ ...base, authorization: 'Bearer test-secret' }))).code).toBe(
      ErrorCode.AUTH_SERVICE_UNAVAILABLE
    );
    expect(
      (await catchAsync(
        resolvePrincipal({ ...base, authorization: 'Bearer test-secret', authServiceReference: 'ldap://nowhere' })
      )).code
    ).toBe(ErrorCode.AUTH_SERVICE_UNAVAILABLE);
    expect(
      (await catchAsync(resolvePrincipal({ ...base, authorization: 'Basic dXNlcg==', authServiceReference: AUTH_URL })))
        .code
    ).toBe(ErrorCode.AUTHENTICATION_REQUIRED);
  });

  test('the principal header is honoured only when trusted', async () => {
    const trusted = await resolvePrincipal({
      principalHeader: ' bob ',
      trustPrincipalHeader: true,
      resolveAuthService,
    });
    expect(trusted).toEqual({ principal: 'bob', source: PrincipalSource.HEADER, verified: false });

    const untrusted = await catchAsync(
      resolvePrincipal({ principalHeader: 'bob', trustPrincipalHeader: false, resolveAuthService })
    );
    expect(untrusted.code).toBe(ErrorCode.AUTHENTICATION_REQUIRED);
  });
});

describe('ownership', () => {
  const alice = asPrincipalId('alice');
  const bob = asPrincipalId('bob');

  const capture: Capture = {
    id: asRecordId('cap-abc'),
    kind: RecordKind.CAPTURE,
    owner: alice,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    captureType: CaptureType.IDEA,
    title: 'Idea',
    status: 'Draft',
    priority: 'Medium',
    fields: {},
  };

  const publicTemplate: Template = {
    id: asRecordId('tpl-abc'),
    kind: RecordKind.TEMPLATE,
    owner: alice,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    templateKind: TemplateKind.DOCUMENT,
    visibility: Visibility.PUBLIC,
    name: 'Shared',
    defaultFields: {},
    defaultContent: '',
  };

  test('only public templates are readable by others', () => {
    expect(isReadableBy(capture, alice)).toBe(true);
    expect(isReadableBy(capture, bob)).toBe(false);
    expect(isReadableBy(publicTemplate, bob)).toBe(true);
  });

  test('requireOwned distinguishes hidden from foreign records', () => {
    expect(requireOwned(capture, 'capture', capture.id, alice)).toBe(capture);
    expect(catchError(() => requireOwned(capture, 'capture', capture.id, bob)).code).toBe(ErrorCode.NOT_FOUND);
    expect(catchError(() => requireOwned(undefined, 'capture', 'cap-zzz', alice)).code).toBe(ErrorCode.NOT_FOUND);
    expect(catchError(() => requireOwned(publicTemplate, 'template', publicTemplate.id, bob)).code).toBe(
      ErrorCode.NOT_OWNER
    );
  });

  test('requireController', () => {
    expect(requireController(['root'], 'root')).toBe('root');
    expect(catchError(() => requireController(['root'], 'alice')).code).toBe(ErrorCode.NOT_CONTROLLER);
    expect(catchError(() => requireController(['anonymous'], 'anonymous')).code).toBe(
      ErrorCode.AUTHENTICATION_REQUIRED
    );
  });
});
