/**
 * Bearer token guard for hosted servers.
 *
 * Verified tokens are kept per request and handed to the MCP transport as `AuthInfo`,
 * which makes them visible to tool handlers as `extra.authInfo`.
 */

import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { AccessToken, TokenVerifier } from '../auth/types.js';
import { validateMcpToken } from '../auth/validate-token.js';
import { TokenValidationError, toErrorMessage } from '../errors.js';
import { describeToken, logger } from '../observability/logger.js';

export interface BearerAuthOptions {
  verifier: TokenVerifier;
  requiredScopes?: readonly string[];
  /** Advertised in `WWW-Authenticate` so clients can discover the authorization server. */
  resourceMetadataUrl: string;
}

const verifiedTokens = new WeakMap<Request, AccessToken>();

export function getVerifiedToken(req: Request): AccessToken | undefined {
  return verifiedTokens.get(req);
}

export function toAuthInfo(token: AccessToken): AuthInfo {
  return {
    token: token.token,
    clientId: token.clientId,
    scopes: token.scopes,
    expiresAt: token.expiresAt,
    resource: toUrl(token.resource),
  };
}

function toUrl(value: string | undefined): URL | undefined {
  if (!value) {
    return undefined;
  }
  try {
    return new URL(value);
  } catch {
    logger.debug('Ignoring token resource that is not a URL', { resource: value });
    return undefined;
  }
}

/**
 * RFC 6750 challenge with the RFC 9728 `resource_metadata` parameter.
 */
export function createWwwAuthenticate(resourceMetadataUrl: string, errorCode: string, errorDescription: string): string {
  return `Bearer error="${errorCode}", error_description="${errorDescription}", resource_metadata="${resourceMetadataUrl}"`;
}

export function requireBearerToken(options: BearerAuthOptions): RequestHandler {
  const requiredScopes = options.requiredScopes ?? [];

  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.headers.authorization ?? '';
    validateMcpToken(header, options.verifier, requiredScopes)
      .then(token => {
        verifiedTokens.set(req, token);
        logger.debug('Accepted bearer token', { clientId: token.clientId, token: describeToken(token.token) });
        next();
      })
      .catch((error: unknown) => {
        if (!(error instanceof TokenValidationError)) {
          logger.error('Token verification failed', { error: toErrorMessage(error) });
          next(error);
          return;
        }

        const insufficientScope = error.reason === 'insufficient_scope';
        const errorCode = insufficientScope ? 'insufficient_scope' : 'invalid_token';
        logger.info('Rejected bearer token', { reason: error.reason, path: req.path });
        res
          .status(insufficientScope ? 403 : 401)
          .header('WWW-Authenticate', createWwwAuthenticate(options.resourceMetadataUrl, errorCode, error.message))
          .header('Cache-Control', 'no-cache, no-store, must-revalidate')
          .json({ error: errorCode, error_description: error.message });
      });
  };
}
