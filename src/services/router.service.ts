import { BusinessProfile } from '../types/knowledge';
import { Session } from '../types/session';
import { DEFAULT_PHONE_PATTERN, extractPhone, looksLikeName } from '../utils/fields';
import { logger } from '../utils/logger';
import { AssistantService } from './assistant.service';
import { FieldExtractionService } from './extraction.service';
import { KnowledgeBaseService, quickIntentAnswer } from './knowledge.service';
import { LeadService } from './lead.service';
import { SAFETY_REFUSAL, isDiyRequest, isUnsafeReply, stripBookingClaims } from './safety.service';
import { appendTurn } from './session.service';

export const NAME_REQUEST = 'By the way, what should we call you?';
export const NAME_RETRY = 'Please send just your name, for example "John".';
export const PHONE_NUDGE = 'If you want us to call you back, just send your phone number.';
export const BOOKING_FALLBACK = 'A manager will confirm the details with you. Send your phone number or type /ro to book a repair.';

const NUDGE_EVERY = 3;

export type RouterStepName = 'diy-refusal' | 'awaiting-name' | 'phone-lead' | 'quick-intent' | 'faq' | 'assistant';

export interface RouteInput {
  session: Session;
  text: string;
  displayName: string;
}

export type StepOutcome = { handled: true; reply: string; session: Session } | { handled: false };

export interface RouterStep {
  name: RouterStepName;
  run(input: RouteInput): Promise<StepOutcome>;
}

export interface RouteResult {
  step: RouterStepName;
  reply: string;
  session: Session;
}

export interface RouterDependencies {
  knowledge: KnowledgeBaseService;
  assistant: AssistantService;
  leads: LeadService;
  extractor: FieldExtractionService;
  profile: BusinessProfile;
  phonePattern?: RegExp;
  /** When false, a phone in free text is ignored once the session already has one. */
  leadWhenPhoneKnown?: boolean;
}

const PASS: StepOutcome = { handled: false };

function handled(reply: string, session: Session): StepOutcome {
  return { handled: true, reply, session };
}

/** Channels that identify the sender by phone number. */
function phoneGuaranteed(session: Session): boolean {
  return session.channel === 'whatsapp' || session.channel === 'sms';
}

/** Canned answers ask for a name once a lead exists and nobody has given one yet. */
function withNameRequest(reply: string, session: Session): StepOutcome {
  if (session.leadId && !session.knownName && !session.awaitingName) {
    return handled(`${reply}\n\n${NAME_REQUEST}`, { ...session, awaitingName: true });
  }
  return handled(reply, session);
}

/**
 * Handles free text outside the repair-order form. Steps run in declaration order
 * and the first one that handles the message produces the reply.
 */
export class FreeTextRouter {
  readonly steps: readonly RouterStep[];
  private phonePattern: RegExp;

  constructor(private deps: RouterDependencies) {
    this.phonePattern = deps.phonePattern ?? DEFAULT_PHONE_PATTERN;
    this.steps = [
      { name: 'diy-refusal', run: async ({ session, text }) => (isDiyRequest(text) ? handled(SAFETY_REFUSAL, session) : PASS) },
      { name: 'awaiting-name', run: (input) => this.awaitingName(input) },
      { name: 'phone-lead', run: (input) => this.phoneLead(input) },
      { name: 'quick-intent', run: async ({ session, text }) => this.cannedAnswer(quickIntentAnswer(text, deps.profile), session) },
      { name: 'faq', run: async ({ session, text }) => this.cannedAnswer(deps.knowledge.match(text), session) },
      { name: 'assistant', run: (input) => this.assistantReply(input) },
    ];
  }

  async route(input: RouteInput): Promise<RouteResult> {
    for (const step of this.steps) {
      const outcome = await step.run(input);
      if (outcome.handled) {
        logger.debug('Message routed', { conversationId: input.session.conversationId, step: step.name });
        return { step: step.name, reply: outcome.reply, session: outcome.session };
      }
    }
    throw new Error('No router step handled the message');
  }

  private async awaitingName({ session, text }: RouteInput): Promise<StepOutcome> {
    if (!session.awaitingName) return PASS;

    if (!looksLikeName(text, this.phonePattern)) {
      return handled(NAME_RETRY, session);
    }

    const name = text.trim();
    return handled(`Nice to meet you, ${name}! A manager will be in touch soon. Anything else I can help with?`, {
      ...session,
      knownName: name,
      awaitingName: false,
    });
  }

  private async phoneLead({ session, text, displayName }: RouteInput): Promise<StepOutcome> {
    const phone = extractPhone(text, this.phonePattern);
    if (!phone) return PASS;
    if (session.knownPhone && this.deps.leadWhenPhoneKnown === false) return PASS;

    const extracted = await this.deps.extractor.extract(text);
    const outcome = await this.deps.leads.createLead({
      phone,
      name: session.knownName ?? displayName,
      channel: session.channel,
      history: appendTurn(session.history, 'user', text),
      extracted,
    });

    switch (outcome.status) {
      case 'created': {
        const next: Session = { ...session, knownPhone: phone, leadId: outcome.id };
        if (!next.knownName) {
          return handled(`${outcome.reply}\n\n${NAME_REQUEST}`, { ...next, awaitingName: true });
        }
        return handled(outcome.reply, next);
      }
      case 'not-configured':
        return handled(outcome.reply, { ...session, knownPhone: phone });
      case 'failed':
        // the user can simply send the number again
        return handled(outcome.reply, session);
    }
  }

  private cannedAnswer(answer: string | null, session: Session): StepOutcome {
    return answer ? withNameRequest(answer, session) : PASS;
  }

  private async assistantReply({ session, text }: RouteInput): Promise<StepOutcome> {
    const hint = this.deps.knowledge.contextHint(text);
    const raw = await this.deps.assistant.reply(session.history, text, hint);

    let reply: string;
    if (isUnsafeReply(raw)) {
      logger.warn('Assistant reply contained repair instructions, replaced with refusal', {
        conversationId: session.conversationId,
      });
      reply = SAFETY_REFUSAL;
    } else if (!session.leadId) {
      reply = stripBookingClaims(raw) || BOOKING_FALLBACK;
    } else {
      reply = raw;
    }

    if (session.knownPhone || phoneGuaranteed(session)) {
      return handled(reply, session);
    }

    const hintCounter = session.hintCounter + 1;
    if (hintCounter % NUDGE_EVERY === 0) {
      reply = `${reply}\n\n${PHONE_NUDGE}`;
    }
    return handled(reply, { ...session, hintCounter });
  }
}
