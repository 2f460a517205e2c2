/**
 * JSON record API.
 *
 * GET    /api/dns/:domain/records      list records visible to the token
 * POST   /api/dns/:domain/records      create a record
 * PUT    /api/dns/:domain/records/:id  replace a record
 * DELETE /api/dns/:domain/records/:id  delete a record
 * GET    /api/myip                     caller's detected address (no auth)
 *
 * `:domain` names the zone. Record hostnames are fully qualified.
 */

import { NextFunction, Request, Response, Router } from 'express';
import { UpdateProcessor } from '../proxy/update-processor';
import { clientIp, requestContext, sendOutcome } from './middleware';

export interface DnsRouteOptions {
  trustProxy: boolean;
}

export function createDnsRoutes(processor: UpdateProcessor, options: DnsRouteOptions): Router {
  const router = Router();
  const { trustProxy } = options;

  router.get('/myip', (req, res) => {
    res.json({ ip: clientIp(req, trustProxy) });
  });

  router.get('/dns/:domain/records', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await processor.listRecords(requestContext(req, trustProxy), req.params.domain);
      sendOutcome(res, outcome);
    } catch (err) {
      next(err);
    }
  });

  router.post('/dns/:domain/records', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await processor.createRecord(requestContext(req, trustProxy), req.params.domain, req.body);
      sendOutcome(res, outcome, 201);
    } catch (err) {
      next(err);
    }
  });

  router.put('/dns/:domain/records/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await processor.updateRecord(
        requestContext(req, trustProxy),
        req.params.domain,
        req.params.id,
        req.body,
      );
      sendOutcome(res, outcome);
    } catch (err) {
      next(err);
    }
  });

  router.delete('/dns/:domain/records/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await processor.deleteRecord(requestContext(req, trustProxy), req.params.domain, req.params.id);
      sendOutcome(res, outcome);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
