import { CRMAdapter } from '../types/crm';
import { Channel, HistoryTurn, PartialRecord } from '../types/session';
import { HttpError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const ERROR_BODY_LIMIT = 600;
const DESCRIPTION_TURNS = 3;

const CHANNEL_LABELS: Record<Channel, string> = {
  telegram: 'Telegram',
  whatsapp: 'WhatsApp',
  sms: 'SMS',
  web: 'Web chat',
};

export interface LeadRequest {
  phone: string;
  name: string;
  channel: Channel;
  history: HistoryTurn[];
  extracted?: PartialRecord;
}

export type LeadOutcome =
  | { status: 'created'; id: string; reply: string }
  | { status: 'not-configured'; reply: string }
  | { status: 'failed'; reply: string };

export interface LeadOptions {
  locationId?: number;
  source?: string;
}

export function buildLeadTitle(extracted?: PartialRecord): string {
  return extracted?.makeModel ? `Motorcycle repair request: ${extracted.makeModel}` : 'Motorcycle repair request';
}

export function buildLeadDescription(request: LeadRequest): string {
  const lines = [`Source: ${CHANNEL_LABELS[request.channel]}.`];

  const extracted = request.extracted;
  if (extracted?.makeModel) lines.push(`Bike: ${extracted.makeModel}`);
  if (extracted?.plate) lines.push(`Plate: ${extracted.plate}`);
  if (extracted?.odometer !== undefined) lines.push(`Odometer: ${extracted.odometer} km`);

  const recent = request.history
    .filter((turn) => turn.role === 'user')
    .slice(-DESCRIPTION_TURNS)
    .map((turn) => `- ${turn.text}`);
  if (recent.length > 0) {
    lines.push('Recent messages:', ...recent);
  }

  return lines.join('\n');
}

export class LeadService {
  constructor(
    private crm: CRMAdapter | null,
    private options: LeadOptions = {}
  ) {}

  async createLead(request: LeadRequest): Promise<LeadOutcome> {
    if (!this.crm) {
      logger.warn('Phone received but no CRM is configured', { channel: request.channel });
      return {
        status: 'not-configured',
        reply: `Phone received ✅ (${request.phone}). Our CRM isn't connected yet, so a manager will contact you directly.`,
      };
    }

    try {
      const inquiry = await this.crm.createInquiry({
        phone: request.phone,
        name: request.name,
        title: buildLeadTitle(request.extracted),
        description: buildLeadDescription(request),
        locationId: this.options.locationId,
        channel: this.options.source ?? CHANNEL_LABELS[request.channel],
      });

      logger.info('Lead created', { inquiryId: inquiry.id, channel: request.channel });
      return {
        status: 'created',
        id: inquiry.id,
        reply: `Done! ✅ Request #${inquiry.id} has been created.\nPhone: ${request.phone}\nName: ${request.name}\nA manager will contact you shortly.`,
      };
    } catch (error) {
      if (error instanceof HttpError) {
        logger.error('CRM rejected the lead', { status: error.status });
        return {
          status: 'failed',
          reply: `❌ Couldn't create the request in the CRM.\nHTTP ${error.status}\n${error.body.slice(0, ERROR_BODY_LIMIT)}`.trim(),
        };
      }

      logger.error('CRM integration failed', { error: errorMessage(error) });
      return {
        status: 'failed',
        reply: '❌ Integration error: the request could not be created. Please try again a little later.',
      };
    }
  }
}
