/**
 * Tenant Identity - Express Middleware
 *
 * Tags each internal request with the tenant (project + environment) whose
 * commerce client it may use.
 *
 * SECURITY: Tenant headers from external clients are NOT trusted.
 * Resolution order (most secure first):
 * 1. JWT projectId/environment claims (cryptographically signed)
 * 2. Internal gateway headers (with signature verification)
 * 3. Headers from trusted internal network (IP check)
 */

import type { Request, NextFunction } from 'express';
import { createHmac, timingSafeEqual } from 'crypto';
import type { IncomingHttpHeaders } from 'http';
import { GatewayError, TenantMissingError } from '../errors.js';
import { TENANT_HEADERS, getHeader } from '../headers.js';
import { extractTenantPayload, resolveTenantFromJwt, type JwtTenantConfig } from '../jwt.js';
import { componentLogger, type Logger } from '../logger.js';
import { toTenantIdentity } from '../tenant-key.js';
import type { TenantIdentity } from '../types.js';

// =============================================================================
// REQUEST EXTENSION
// =============================================================================

/**
 * Express Request with tenant identity
 */
export interface TenantRequest extends Request {
  /** Present after tenantMiddleware runs */
  tenant?: TenantIdentity;
}

/**
 * The parts of a request tenant resolution reads. Express's Request
 * satisfies it.
 */
export interface TenantRequestLike {
  path: string;
  headers: IncomingHttpHeaders;
  ip?: string;
  socket?: { remoteAddress?: string };
  tenant?: TenantIdentity;
}

/**
 * The parts of a response the gateway's handlers write to
 */
export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

// =============================================================================
// MIDDLEWARE OPTIONS
// =============================================================================

export type HeaderTrustMode = 'jwt-only' | 'internal-network' | 'signed' | 'disabled';

export interface TenantMiddlewareOptions {
  /** Require tenant for all requests (default: true) */
  required?: boolean;

  /** Paths to skip tenant resolution (e.g., health checks); "*" suffix = prefix match */
  skipPaths?: string[];

  /** JWT configuration for token-based resolution */
  jwt?: JwtTenantConfig;

  /**
   * SECURITY: Trust mode for tenant headers
   * - 'jwt-only': Only trust claims from a verified JWT (default)
   * - 'internal-network': Trust headers from private/loopback addresses
   * - 'signed': Trust headers with a valid HMAC signature
   * - 'disabled': Never trust headers
   */
  headerTrustMode?: HeaderTrustMode;

  /** HMAC secret for signed header verification (required if headerTrustMode='signed') */
  headerSignatureSecret?: string;

  /** Environment used when none is supplied */
  defaultEnvironment?: string;

  /** Custom error handler */
  onError?: (error: GatewayError, req: TenantRequestLike, res: JsonResponse) => void;

  logger?: Logger;

  /** Clock override for signature freshness checks */
  now?: () => number;
}

// =============================================================================
// INTERNAL NETWORK DETECTION
// =============================================================================

/**
 * Caller address as Express resolved it. Forwarded headers only count
 * through the app's `trust proxy` setting, which is already applied to
 * `req.ip`.
 */
function getClientIp(req: TenantRequestLike): string {
  return req.ip || req.socket?.remoteAddress || '';
}

/**
 * Private IPv4 ranges, loopback and IPv6 unique-local addresses
 */
export function isInternalNetwork(ip: string): boolean {
  const cleanIp = ip.replace(/^::ffff:/, '');

  if (
    cleanIp.startsWith('10.') ||
    cleanIp.startsWith('192.168.') ||
    cleanIp.startsWith('127.') ||
    cleanIp === 'localhost' ||
    cleanIp === '::1'
  ) {
    return true;
  }

  // 172.16.0.0 - 172.31.255.255
  if (cleanIp.startsWith('172.')) {
    const second = parseInt(cleanIp.split('.')[1] ?? '', 10);
    return second >= 16 && second <= 31;
  }

  // fc00::/7
  return /^f[cd][0-9a-f]{2}:/i.test(cleanIp);
}

// =============================================================================
// HEADER SIGNATURE VERIFICATION
// =============================================================================

const SIGNATURE_MAX_AGE_MS = 5 * 60 * 1000;

/**
 * Signature the internal gateway attaches to forwarded tenant headers
 */
export function signTenantHeaders(
  projectId: string,
  environment: string,
  timestamp: number,
  secret: string
): string {
  return createHmac('sha256', secret)
    .update(`${projectId}:${environment}:${timestamp}`)
    .digest('hex');
}

function verifyHeaderSignature(req: TenantRequestLike, secret: string, now: number): boolean {
  const headers = req.headers;
  const signature = getHeader(headers, TENANT_HEADERS.SIGNATURE);
  const timestamp = getHeader(headers, TENANT_HEADERS.SIGNATURE_TIMESTAMP);
  const projectId = getHeader(headers, TENANT_HEADERS.PROJECT_ID) ?? '';
  const environment = getHeader(headers, TENANT_HEADERS.ENVIRONMENT) ?? '';

  if (!signature || !timestamp) {
    return false;
  }

  // Reject stale signatures (replay window)
  const ts = parseInt(timestamp, 10);
  if (Number.isNaN(ts) || Math.abs(now - ts) > SIGNATURE_MAX_AGE_MS) {
    return false;
  }

  const expected = Buffer.from(signTenantHeaders(projectId, environment, ts, secret), 'hex');
  const received = Buffer.from(signature, 'hex');
  if (received.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(received, expected);
}

// =============================================================================
// MIDDLEWARE
// =============================================================================

/**
 * Express middleware for tenant identity resolution.
 *
 * @example
 * app.use(tenantMiddleware({
 *   skipPaths: ['/health', '/webhooks/*'],
 *   headerTrustMode: 'jwt-only',
 *   jwt: { issuer: 'platform-auth' },
 * }));
 */
export function tenantMiddleware(options: TenantMiddlewareOptions = {}) {
  const {
    required = true,
    skipPaths = [],
    headerTrustMode = 'jwt-only',
    headerSignatureSecret,
    onError,
    now = Date.now,
  } = options;
  const logger = componentLogger('tenant-middleware', options.logger);

  if (headerTrustMode === 'signed' && !headerSignatureSecret) {
    throw new Error('headerSignatureSecret is required when headerTrustMode is "signed"');
  }

  return async (req: TenantRequestLike, res: JsonResponse, next: NextFunction): Promise<void> => {
    try {
      if (shouldSkipPath(req.path, skipPaths)) {
        next();
        return;
      }

      const tenant = await resolveTenant(req, options, logger, now());

      if (!tenant) {
        if (required) {
          throw new TenantMissingError('Unable to determine tenant from request');
        }
        next();
        return;
      }

      req.tenant = tenant;
      next();
    } catch (error) {
      if (error instanceof GatewayError) {
        if (onError) {
          onError(error, req, res);
          return;
        }
        res.status(error.statusCode).json(error.toJSON());
        return;
      }

      logger.error({ err: error }, 'Tenant middleware error');
      res.status(401).json({
        error: {
          code: 'TENANT_RESOLUTION_ERROR',
          message: 'Failed to resolve tenant context',
        },
      });
    }
  };
}

// =============================================================================
// RESOLUTION LOGIC
// =============================================================================

async function resolveTenant(
  req: TenantRequestLike,
  options: TenantMiddlewareOptions,
  logger: Logger,
  now: number
): Promise<TenantIdentity | undefined> {
  const { headerTrustMode = 'jwt-only', headerSignatureSecret, jwt, defaultEnvironment } = options;

  // 1. JWT first
  const token = extractBearerToken(req.headers.authorization);
  if (token && jwt) {
    const payload = await extractTenantPayload(token, jwt);
    return resolveTenantFromJwt(payload, jwt.defaultEnvironment ?? defaultEnvironment);
  }

  // 2. Headers, depending on trust mode
  const projectId = getHeader(req.headers, TENANT_HEADERS.PROJECT_ID);
  if (!projectId) {
    return undefined;
  }

  const clientIp = getClientIp(req);
  switch (headerTrustMode) {
    case 'disabled':
    case 'jwt-only':
      logger.warn({ clientIp, headerTrustMode }, 'Ignoring untrusted x-project-id header');
      return undefined;

    case 'signed':
      if (headerSignatureSecret && verifyHeaderSignature(req, headerSignatureSecret, now)) {
        return buildTenantFromHeaders(req, defaultEnvironment);
      }
      logger.warn({ clientIp }, 'Invalid or missing tenant header signature');
      return undefined;

    case 'internal-network':
      if (isInternalNetwork(clientIp)) {
        return buildTenantFromHeaders(req, defaultEnvironment);
      }
      logger.warn({ clientIp }, 'Tenant headers rejected from external IP');
      return undefined;
  }
}

function buildTenantFromHeaders(req: TenantRequestLike, defaultEnvironment?: string): TenantIdentity {
  const projectId = getHeader(req.headers, TENANT_HEADERS.PROJECT_ID);
  if (!projectId) {
    throw new TenantMissingError('Project ID header is missing');
  }
  return toTenantIdentity(projectId, getHeader(req.headers, TENANT_HEADERS.ENVIRONMENT), defaultEnvironment);
}

export function extractBearerToken(authHeader: string | undefined): string | undefined {
  if (!authHeader?.startsWith('Bearer ')) {
    return undefined;
  }
  return authHeader.slice(7) || undefined;
}

function shouldSkipPath(path: string, skipPaths: string[]): boolean {
  return skipPaths.some((skip) => {
    if (skip.endsWith('*')) {
      return path.startsWith(skip.slice(0, -1));
    }
    return path === skip;
  });
}
