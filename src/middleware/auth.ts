import { Request, Response, NextFunction } from 'express';

export function parseApiKeys(raw: string | undefined): Set<string> {
  return new Set(
    (raw || '')
      .split(',')
      .map((k) => k.trim())
      .filter((k) => k.length > 0)
  );
}

/** `x-api-key` check for the /api routes; webhooks authenticate with their own signatures. */
export function apiKeyAuth(rawKeys: string | undefined) {
  const keys = parseApiKeys(rawKeys);

  return (req: Request, res: Response, next: NextFunction) => {
    const apiKey = req.headers['x-api-key'];

    if (typeof apiKey !== 'string' || !apiKey) {
      return res.status(401).json({ success: false, error: 'Missing API key' });
    }

    if (keys.size === 0 || !keys.has(apiKey)) {
      return res.status(403).json({ success: false, error: 'Invalid API key' });
    }

    next();
  };
}
