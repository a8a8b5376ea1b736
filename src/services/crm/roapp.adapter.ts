import { z } from 'zod';
import { CRMAdapter, CRMConfig, InquiryData, InquiryResult } from '../../types/crm';
import { HttpError } from '../../utils/errors';
import { logger } from '../../utils/logger';

const DEFAULT_BASE_URL = 'https://api.roapp.io';
const DEFAULT_TIMEOUT_MS = 30_000;

const inquiryResponseSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
  })
  .passthrough();

export class RoAppAdapter implements CRMAdapter {
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: CRMConfig) {
    this.apiKey = config.apiKey ?? '';
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private async request(method: string, path: string, body: Record<string, unknown>): Promise<unknown> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: {
        'Authorization': `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      const errorBody = await res.text();
      logger.warn('RO App request rejected', { method, path, status: res.status });
      throw new HttpError(res.status, errorBody, 'RO App');
    }

    return res.json();
  }

  async createInquiry(inquiry: InquiryData): Promise<InquiryResult> {
    logger.info('RO App creating inquiry', { phone: inquiry.phone, channel: inquiry.channel });

    const payload: Record<string, unknown> = {
      contact_phone: inquiry.phone,
      contact_name: inquiry.name,
      title: inquiry.title || 'Incoming request',
    };

    if (inquiry.description) payload.description = inquiry.description;
    if (inquiry.locationId) payload.location_id = Math.trunc(inquiry.locationId);
    if (inquiry.channel) payload.channel = inquiry.channel;

    const raw = await this.request('POST', '/lead/', payload);
    const parsed = inquiryResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error('RO App returned a lead without an id');
    }

    logger.info('RO App inquiry created', { inquiryId: parsed.data.id });
    return parsed.data;
  }
}
