import { BotAction, BotReply, IncomingMessage } from '../types/agent';
import { BusinessProfile } from '../types/knowledge';
import { Session } from '../types/session';
import { errorMessage } from '../utils/errors';
import { KeyedMutex } from '../utils/keyedMutex';
import { logger } from '../utils/logger';
import { IntakeService } from './intake.service';
import { FreeTextRouter } from './router.service';
import { SessionStore, appendTurn, createSession } from './session.service';
import { escapeHtml } from './transport/transport.adapter';

export const APOLOGY_REPLY = 'Sorry, something went wrong on our side. Please try again in a moment.';

export const HELP_TEXT = [
  'Here is what I can do:',
  '/ro or /repair: book a repair step by step',
  '/cancel: cancel the repair order in progress',
  '/id: show your chat id',
  '/help: show this message',
  'You can also just ask about prices, pickup or opening hours, or send your phone number and a manager will call you back.',
].join('\n');

export interface BotDependencies {
  sessions: SessionStore;
  intake: IntakeService;
  router: FreeTextRouter;
  profile: BusinessProfile;
  mutex?: KeyedMutex;
}

interface Handled {
  session: Session;
  text: string;
  action: BotAction;
  richFormatting?: boolean;
}

/** Reads `/ro@my_bot now` as `ro`. */
export function parseCommand(text: string): string | null {
  const match = text.trim().match(/^\/([a-z_]+)(?:@\w+)?(?:\s|$)/i);
  return match ? match[1].toLowerCase() : null;
}

export class BotService {
  private mutex: KeyedMutex;

  constructor(private deps: BotDependencies) {
    this.mutex = deps.mutex ?? new KeyedMutex();
  }

  /** Messages of one conversation are handled strictly one after another. */
  handleMessage(incoming: IncomingMessage): Promise<BotReply> {
    return this.mutex.run(incoming.conversationId, () => this.process(incoming));
  }

  private async process(incoming: IncomingMessage): Promise<BotReply> {
    const { conversationId, channel } = incoming;

    try {
      const stored = await this.deps.sessions.get(conversationId);
      let session = stored ?? createSession(conversationId, channel);
      if (!session.knownPhone && incoming.senderPhone) {
        session = { ...session, knownPhone: incoming.senderPhone };
      }

      const result = (await this.runCommand(session, incoming)) ?? (await this.converse(session, incoming));

      let history = appendTurn(result.session.history, 'user', incoming.text);
      history = appendTurn(history, 'assistant', result.text);
      await this.deps.sessions.put(conversationId, {
        ...result.session,
        history,
        updatedAt: new Date().toISOString(),
      });

      logger.info('Message handled', { conversationId, channel, action: result.action });
      return {
        conversationId,
        text: result.text,
        richFormatting: result.richFormatting ?? false,
        action: result.action,
      };
    } catch (error) {
      logger.error('Message handling failed', { conversationId, channel, error: errorMessage(error) });
      return { conversationId, text: APOLOGY_REPLY, richFormatting: false, action: 'error' };
    }
  }

  private async runCommand(session: Session, incoming: IncomingMessage): Promise<Handled | null> {
    const command = parseCommand(incoming.text);

    switch (command) {
      case 'start':
        return {
          session,
          action: 'command',
          text:
            `Hi ${incoming.displayName}! I'm the assistant of ${this.deps.profile.companyName}, ${this.deps.profile.town}. ` +
            'Ask me about prices, pickup or opening hours, send your phone number for a call back, or type /ro to book a repair.',
        };
      case 'help':
        return { session, action: 'command', text: HELP_TEXT };
      case 'id':
        // Only Telegram renders HTML.
        return incoming.channel === 'telegram'
          ? {
              session,
              action: 'command',
              text: `Your chat id: <code>${escapeHtml(incoming.conversationId)}</code>`,
              richFormatting: true,
            }
          : { session, action: 'command', text: `Your chat id: ${incoming.conversationId}` };
      case 'ro':
      case 'repair': {
        const started = this.deps.intake.start(session);
        return { session: started.session, text: started.reply, action: 'intake' };
      }
      case 'cancel': {
        const cancelled = this.deps.intake.cancel(session);
        return { session: cancelled.session, text: cancelled.reply, action: 'intake' };
      }
      default:
        return null;
    }
  }

  private async converse(session: Session, incoming: IncomingMessage): Promise<Handled> {
    if (this.deps.intake.isActive(session)) {
      const result = await this.deps.intake.handle(session, incoming.text, incoming.conversationId);
      return { session: result.session, text: result.reply, action: 'intake' };
    }

    const routed = await this.deps.router.route({
      session,
      text: incoming.text,
      displayName: incoming.displayName,
    });
    return { session: routed.session, text: routed.reply, action: routed.step };
  }
}
