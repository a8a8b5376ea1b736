/// <reference path="../types/express.d.ts" />
import { Router, Request, Response } from 'express';
import { hmacSignature } from '../middleware/signature';
import { logger } from '../utils/logger';

const CRM_LOG_LIMIT = 800;
const ROAPP_LOG_LIMIT = 500;

function preview(req: Request, limit: number): string {
  const raw = req.rawBody ? req.rawBody.toString('utf8') : JSON.stringify(req.body ?? {});
  return raw.slice(0, limit);
}

export function createCrmRouter(crmSecret: string | undefined): Router {
  const router = Router();

  router.post('/crmhook', hmacSignature(crmSecret), (req: Request, res: Response) => {
    logger.info('CRM webhook received', { body: preview(req, CRM_LOG_LIMIT) });
    res.send('ok');
  });

  // Event feed from RO App; nothing acts on it yet
  router.post('/roapp-webhook', (req: Request, res: Response) => {
    logger.info('RO App webhook received', { body: preview(req, ROAPP_LOG_LIMIT) });
    res.json({ ok: true });
  });

  return router;
}
