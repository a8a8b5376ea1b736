import { FormState, IntakeDraft, IntakeRecord, Session } from '../types/session';
import { errorMessage } from '../utils/errors';
import {
  DEFAULT_PHONE_PATTERN,
  ISSUE_MAX_LENGTH,
  MAKE_MODEL_MAX_LENGTH,
  normalizeOdometer,
  normalizePlate,
  parsePhone,
  truncate,
} from '../utils/fields';
import { logger } from '../utils/logger';
import { RepairOrderStore } from './database.service';
import { OperationsChannel } from './operations.service';

const PLATE_MIN_LENGTH = 3;
const CANCEL_KEYWORDS = new Set(['no', 'cancel', 'stop', 'нет', 'отмена', 'отменить']);

export const PROMPTS = {
  phone: "Let's book your repair. What phone number can we reach you on? Please use the international format, e.g. +27821234567.",
  phoneRetry: "That doesn't look like a valid phone number. Send it in the international format starting with +, e.g. +27821234567.",
  model: 'What is the make and model of your motorcycle? For example: Honda CG125.',
  plate: "What's the registration plate number?",
  plateRetry: 'Please send the plate number using letters and digits, at least 3 characters.',
  odometer: 'What does the odometer show, in km?',
  odometerRetry: 'Please send the odometer reading as a whole number of kilometres, e.g. 45000.',
  issue: "Briefly describe what's wrong with the bike.",
  cancelled: 'Your repair order has been cancelled. Type /ro whenever you want to start again.',
  saveFailed: "Sorry, we couldn't save your repair order just now. Reply \"yes\" to try again or /cancel to stop.",
} as const;

export interface IntakeResult {
  session: Session;
  reply: string;
  submittedId?: number;
}

export interface IntakeOptions {
  phonePattern?: RegExp;
}

export function formatPreview(record: IntakeRecord): string {
  return [
    'Please check your repair order:',
    `Phone: ${record.phone}`,
    `Motorcycle: ${record.makeModel}`,
    `Plate: ${record.plate}`,
    `Odometer: ${record.odometer} km`,
    `Issue: ${record.issue}`,
    '',
    'Is everything correct? Reply "yes" to submit or "no" to cancel.',
  ].join('\n');
}

export function formatOperationsNotice(id: number, record: IntakeRecord, authorId: string): string {
  return [
    `🛠 New repair order #${id}`,
    `Phone: ${record.phone}`,
    `Motorcycle: ${record.makeModel}`,
    `Plate: ${record.plate}`,
    `Odometer: ${record.odometer} km`,
    `Issue: ${record.issue}`,
    `From: ${authorId}`,
  ].join('\n');
}

function isCancelReply(text: string): boolean {
  const words = text.toLowerCase().split(/[^\p{L}]+/u);
  return words.some((word) => CANCEL_KEYWORDS.has(word));
}

function completeRecord(draft: IntakeDraft): IntakeRecord | null {
  const { phone, makeModel, plate, odometer, issue } = draft;
  if (phone === undefined || makeModel === undefined || plate === undefined) return null;
  if (odometer === undefined || issue === undefined) return null;
  return { phone, makeModel, plate, odometer, issue };
}

/**
 * The repair-order form: phone, make/model, plate, odometer, issue, then confirmation.
 * Every transition returns a new session value; the caller decides whether to save it.
 */
export class IntakeService {
  private phonePattern: RegExp;

  constructor(
    private store: RepairOrderStore,
    private ops: OperationsChannel,
    options: IntakeOptions = {}
  ) {
    this.phonePattern = options.phonePattern ?? DEFAULT_PHONE_PATTERN;
  }

  isActive(session: Session): boolean {
    return session.formState !== 'NONE';
  }

  /** Starting over discards any draft in progress. */
  start(session: Session): IntakeResult {
    return { session: this.transition(session, 'AWAITING_PHONE', {}), reply: PROMPTS.phone };
  }

  cancel(session: Session): IntakeResult {
    return {
      session: { ...this.transition(session, 'NONE', {}), awaitingName: false },
      reply: PROMPTS.cancelled,
    };
  }

  async handle(session: Session, text: string, authorId: string): Promise<IntakeResult> {
    const input = text.trim();

    switch (session.formState) {
      case 'NONE':
        return this.start(session);

      case 'AWAITING_PHONE': {
        const phone = parsePhone(input, this.phonePattern);
        if (!phone) return { session, reply: PROMPTS.phoneRetry };
        return this.advance(session, 'AWAITING_MODEL', { phone }, PROMPTS.model);
      }

      case 'AWAITING_MODEL': {
        if (!input) return { session, reply: PROMPTS.model };
        return this.advance(session, 'AWAITING_PLATE', { makeModel: truncate(input, MAKE_MODEL_MAX_LENGTH) }, PROMPTS.plate);
      }

      case 'AWAITING_PLATE': {
        const plate = normalizePlate(input);
        if (plate.length < PLATE_MIN_LENGTH) return { session, reply: PROMPTS.plateRetry };
        return this.advance(session, 'AWAITING_ODOMETER', { plate }, PROMPTS.odometer);
      }

      case 'AWAITING_ODOMETER': {
        const odometer = normalizeOdometer(input, { allowZero: true });
        if (odometer === null) return { session, reply: PROMPTS.odometerRetry };
        return this.advance(session, 'AWAITING_ISSUE', { odometer }, PROMPTS.issue);
      }

      case 'AWAITING_ISSUE': {
        if (!input) return { session, reply: PROMPTS.issue };
        const draft: IntakeDraft = { ...session.draft, issue: truncate(input, ISSUE_MAX_LENGTH) };
        const record = completeRecord(draft);
        if (!record) {
          logger.warn('Repair order draft incomplete at preview, restarting form', { conversationId: session.conversationId });
          return this.start(session);
        }
        return { session: this.transition(session, 'AWAITING_CONFIRM', draft), reply: formatPreview(record) };
      }

      case 'AWAITING_CONFIRM':
        if (isCancelReply(input)) return this.cancel(session);
        return this.submit(session, authorId);
    }
  }

  private async submit(session: Session, authorId: string): Promise<IntakeResult> {
    const record = completeRecord(session.draft);
    if (!record) {
      logger.warn('Repair order draft incomplete at confirmation, restarting form', { conversationId: session.conversationId });
      return this.start(session);
    }

    let id: number;
    try {
      id = await this.store.insertRecord(record, authorId);
    } catch (error) {
      logger.error('Failed to store repair order', { conversationId: session.conversationId, error: errorMessage(error) });
      return { session, reply: PROMPTS.saveFailed };
    }

    await this.ops.notify(formatOperationsNotice(id, record, authorId));

    return {
      session: this.transition(session, 'NONE', {}),
      reply: `Thank you! Repair order #${id} has been registered. A manager will contact you shortly.`,
      submittedId: id,
    };
  }

  private advance(session: Session, next: FormState, fields: IntakeDraft, reply: string): IntakeResult {
    return { session: this.transition(session, next, { ...session.draft, ...fields }), reply };
  }

  private transition(session: Session, formState: FormState, draft: IntakeDraft): Session {
    return { ...session, formState, draft };
  }
}
