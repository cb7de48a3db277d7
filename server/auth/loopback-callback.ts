/**
 * Loopback OAuth callback receiver.
 *
 * Starts a one-shot Express listener on the redirect URI's host and port, waits for the
 * authorization server to redirect back, and shuts the listener down again.
 */

import express from 'express';
import type { Server } from 'node:http';
import { OAuthFlowError, TimeoutError } from '../errors.js';
import { logger } from '../observability/logger.js';

export interface AuthorizationCallback {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
}

export interface CallbackRequest {
  /** State sent with the authorization request. */
  state: string;
  /** Aborted by the flow once it no longer needs the callback. */
  signal: AbortSignal;
}

export type CallbackReceiver = (request: CallbackRequest) => Promise<AuthorizationCallback>;

export interface LoopbackReceiverOptions {
  redirectUri: string;
  timeoutMs?: number;
}

const DEFAULT_CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;

function queryValue(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function createLoopbackCallbackReceiver(options: LoopbackReceiverOptions): CallbackReceiver {
  const redirect = new URL(options.redirectUri);
  const timeoutMs = options.timeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS;
  const port = Number(redirect.port || (redirect.protocol === 'https:' ? 443 : 80));

  return ({ signal }) =>
    new Promise<AuthorizationCallback>((resolve, reject) => {
      let server: Server | undefined;
      let settled = false;

      const finish = (outcome: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        server?.close(error => {
          if (error) {
            logger.debug('Callback listener close reported an error', { error: error.message });
          }
        });
        server?.closeIdleConnections();
        outcome();
      };

      const onAbort = (): void => finish(() => reject(new OAuthFlowError('Authorization flow was cancelled')));
      const timer = setTimeout(
        () => finish(() => reject(new TimeoutError('Waiting for the authorization callback', timeoutMs))),
        timeoutMs,
      );

      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });

      const app = express();
      app.get(redirect.pathname, (req, res) => {
        const callback: AuthorizationCallback = {
          code: queryValue(req.query.code),
          state: queryValue(req.query.state),
          error: queryValue(req.query.error),
          errorDescription: queryValue(req.query.error_description),
        };
        res.on('finish', () => finish(() => resolve(callback)));
        res
          .status(callback.error ? 400 : 200)
          .type('text/plain')
          .send(callback.error ? 'Authorization failed. You can close this window.' : 'Authorization complete. You can close this window.');
      });

      server = app.listen(port, redirect.hostname, () => {
        logger.debug('Waiting for OAuth callback', { redirectUri: options.redirectUri });
      });
      server.once('error', error => {
        finish(() => reject(new OAuthFlowError(`Callback listener failed: ${error.message}`, { cause: error })));
      });
    });
}
