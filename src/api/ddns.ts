/**
 * Dynamic DNS update endpoints.
 *
 * GET|POST /api/ddns/dyndns2/update  (DynDNS2 vocabulary)
 * GET|POST /api/ddns/noip/update     (No-IP vocabulary)
 *
 * Parameters come from the query string or an urlencoded body: `hostname`
 * (required) and `myip` (optional). Bodies are exact plain text.
 */

import { Request, Response, Router } from 'express';
import { DDNS_PROTOCOLS, DdnsResponse, renderDdnsResponse } from '../domain/ddns-protocol';
import { UpdateProcessor } from '../proxy/update-processor';
import { logger } from '../logger';
import { requestContext } from './middleware';

export interface DdnsRouteOptions {
  trustProxy: boolean;
}

export function createDdnsRoutes(processor: UpdateProcessor, options: DdnsRouteOptions): Router {
  const router = Router();

  for (const protocol of DDNS_PROTOCOLS) {
    const handler = async (req: Request, res: Response) => {
      try {
        const outcome = await processor.processDdnsUpdate(protocol, requestContext(req, options.trustProxy), {
          hostname: readParam(req, 'hostname'),
          myip: readParam(req, 'myip'),
        });
        if (outcome.kind === 'rate_limited') {
          res.set('Retry-After', String(Math.ceil(outcome.retryAfterMs / 1000)));
        }
        sendText(res, renderDdnsResponse(protocol, outcome));
      } catch (err) {
        // Reached only when the activity log cannot be written.
        logger.critical('DDNS request failed', {
          protocol,
          error: err instanceof Error ? err.message : String(err),
          stack: err instanceof Error ? err.stack : undefined,
        });
        sendText(res, renderDdnsResponse(protocol, { kind: 'internal_fault' }));
      }
    };

    router.get(`/${protocol}/update`, handler);
    router.post(`/${protocol}/update`, handler);
  }

  return router;
}

/** Query string first, then the form body. Repeated parameters take the first value. */
function readParam(req: Request, name: string): string | undefined {
  return firstString(req.query[name]) ?? (isRecord(req.body) ? firstString(req.body[name]) : undefined);
}

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function sendText(res: Response, response: DdnsResponse): void {
  res.status(response.status).type('text/plain; charset=utf-8').send(response.body);
}
