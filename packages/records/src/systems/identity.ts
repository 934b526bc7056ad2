/**
 * Identity Guard - principal resolution and ownership checks
 *
 * Every store operation runs on behalf of exactly one principal. Records are
 * visible only to their owner, except public templates, which every
 * authenticated principal may read. A record the caller cannot see reads as
 * NOT_FOUND; a record the caller can see but does not own fails with NOT_OWNER.
 */

import {
  ANONYMOUS_PRINCIPAL,
  ErrorCode,
  IdentityError,
  RecordKind,
  Visibility,
  authenticationRequired,
  isTrellisError,
  isValidPrincipalId,
  notController,
  notFound,
  notOwner,
  type BaseRecord,
  type PrincipalId,
} from '@trellis/core';

// ============================================================================
// Auth Service
// ============================================================================

/**
 * External service that turns an access token into the principal it was
 * issued to. Rejects when the token is invalid or expired.
 */
export interface AuthService {
  validateAccessToken(accessToken: string): Promise<string>;
}

/**
 * Maps the stored auth service reference to a client; undefined when the
 * reference cannot be served
 */
export type AuthServiceResolver = (reference: string) => AuthService | undefined;

// ============================================================================
// Principal Context
// ============================================================================

/**
 * Where the caller principal came from
 */
export const PrincipalSource = {
  /** Bearer access token validated by the auth service */
  TOKEN: 'token',
  /** Trusted X-Principal header */
  HEADER: 'header',
  /** Passed directly by in-process callers */
  EXPLICIT: 'explicit',
} as const;

export type PrincipalSource = (typeof PrincipalSource)[keyof typeof PrincipalSource];

export interface PrincipalContext {
  readonly principal: PrincipalId;
  readonly source: PrincipalSource;
  /** True only when an auth service vouched for the principal */
  readonly verified: boolean;
}

/**
 * Inputs for resolving the caller of a request
 */
export interface PrincipalResolutionOptions {
  /** Raw Authorization header */
  authorization?: string;
  /** Raw X-Principal header */
  principalHeader?: string;
  /** Accept principalHeader without verification */
  trustPrincipalHeader: boolean;
  /** Auth service reference from settings */
  authServiceReference?: string;
  resolveAuthService: AuthServiceResolver;
}

const BEARER_PREFIX = /^Bearer\s+/i;

/**
 * Checks that a caller is an authenticated, well-formed principal
 *
 * @throws IdentityError AUTHENTICATION_REQUIRED for missing or anonymous callers
 */
export function requireAuthenticated(principal: string | null | undefined): PrincipalId {
  if (principal === undefined || principal === null || principal === '' || principal === ANONYMOUS_PRINCIPAL) {
    throw authenticationRequired();
  }
  if (!isValidPrincipalId(principal)) {
    throw authenticationRequired({ value: principal, expected: 'principal id' });
  }
  return principal;
}

export function createPrincipalContext(
  principal: string,
  source: PrincipalSource = PrincipalSource.EXPLICIT
): PrincipalContext {
  return {
    principal: requireAuthenticated(principal),
    source,
    verified: false,
  };
}

/**
 * Validates an access token through the configured auth service
 */
export async function validateAccessToken(
  accessToken: string,
  authServiceReference: string | undefined,
  resolveAuthService: AuthServiceResolver
): Promise<PrincipalContext> {
  if (accessToken.length === 0) {
    throw new IdentityError('Access token is required', ErrorCode.AUTHENTICATION_REQUIRED);
  }
  if (authServiceReference === undefined) {
    throw new IdentityError(
      'Auth service not configured. Set the auth service reference first.',
      ErrorCode.AUTH_SERVICE_UNAVAILABLE
    );
  }
  const service = resolveAuthService(authServiceReference);
  if (!service) {
    throw new IdentityError(
      `Auth service ${authServiceReference} cannot be reached`,
      ErrorCode.AUTH_SERVICE_UNAVAILABLE,
      { value: authServiceReference }
    );
  }

  let principal: string;
  try {
    principal = await service.validateAccessToken(accessToken);
  } catch (error) {
    if (isTrellisError(error)) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new IdentityError(
      `Session validation failed: ${message}`,
      ErrorCode.INVALID_ACCESS_TOKEN,
      {},
      error instanceof Error ? error : undefined
    );
  }

  return {
    principal: requireAuthenticated(principal),
    source: PrincipalSource.TOKEN,
    verified: true,
  };
}

/**
 * Resolves the caller of a request: a bearer token wins over the
 * X-Principal header, which is only honoured when trusted
 */
export async function resolvePrincipal(options: PrincipalResolutionOptions): Promise<PrincipalContext> {
  const authorization = options.authorization?.trim();
  if (authorization) {
    if (!BEARER_PREFIX.test(authorization)) {
      throw new IdentityError(
        'Authorization header must use the Bearer scheme',
        ErrorCode.AUTHENTICATION_REQUIRED
      );
    }
    return validateAccessToken(
      authorization.replace(BEARER_PREFIX, '').trim(),
      options.authServiceReference,
      options.resolveAuthService
    );
  }

  const header = options.principalHeader?.trim();
  if (header && options.trustPrincipalHeader) {
    return createPrincipalContext(header, PrincipalSource.HEADER);
  }

  throw authenticationRequired();
}

// ============================================================================
// Ownership
// ============================================================================

function isPublicTemplateRecord(record: BaseRecord): boolean {
  return record.kind === RecordKind.TEMPLATE && 'visibility' in record && record.visibility === Visibility.PUBLIC;
}

/**
 * Whether the caller may read a record
 */
export function isReadableBy(record: BaseRecord, caller: PrincipalId): boolean {
  return record.owner === caller || isPublicTemplateRecord(record);
}

/**
 * Returns a record the caller may read
 *
 * @throws NotFoundError when the record is missing or hidden from the caller
 */
export function requireReadable<T extends BaseRecord>(
  record: T | undefined,
  kind: string,
  id: string,
  caller: PrincipalId
): T {
  if (!record || !isReadableBy(record, caller)) {
    throw notFound(kind, id);
  }
  return record;
}

/**
 * Returns a record the caller owns
 *
 * @throws NotFoundError when the record is missing or hidden from the caller
 * @throws IdentityError NOT_OWNER when the caller can read but not change it
 */
export function requireOwned<T extends BaseRecord>(
  record: T | undefined,
  kind: string,
  id: string,
  caller: PrincipalId
): T {
  const readable = requireReadable(record, kind, id, caller);
  if (readable.owner !== caller) {
    throw notOwner(kind, id);
  }
  return readable;
}

// ============================================================================
// Controllers
// ============================================================================

export function isController(controllers: readonly string[], principal: string): boolean {
  return controllers.includes(principal);
}

/**
 * @throws IdentityError NOT_CONTROLLER
 */
export function requireController(controllers: readonly string[], principal: string | null | undefined): PrincipalId {
  const caller = requireAuthenticated(principal);
  if (!isController(controllers, caller)) {
    throw notController(caller);
  }
  return caller;
}
