/// <reference path="../types/express.d.ts" />
import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { logger } from '../utils/logger';

const SIGNATURE_HEADERS = [
  'x-signature-sha256',
  'x-hub-signature-256',
  'x-crm-signature',
  'x-signature',
  'x-hub-signature',
];

export function readSignature(req: Pick<Request, 'headers'>): string | null {
  for (const name of SIGNATURE_HEADERS) {
    const value = req.headers[name];
    if (typeof value === 'string' && value.trim()) {
      return value.trim().replace(/^sha256=/i, '');
    }
  }
  return null;
}

export function verifyHmac(secret: string, body: Buffer, signature: string): boolean {
  const expected = Buffer.from(crypto.createHmac('sha256', secret).update(body).digest('hex'));
  const received = Buffer.from(signature.toLowerCase());
  return expected.length === received.length && crypto.timingSafeEqual(expected, received);
}

/** HMAC-SHA256 check of the raw body. Without a secret the check is disabled. */
export function hmacSignature(secret: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!secret) {
      return next();
    }

    const signature = readSignature(req);
    if (!signature || !verifyHmac(secret, req.rawBody ?? Buffer.alloc(0), signature)) {
      logger.warn('Invalid webhook signature', { path: req.path });
      return res.status(401).send('unauthorized');
    }

    next();
  };
}
