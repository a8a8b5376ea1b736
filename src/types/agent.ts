import { Channel } from './session';

/** Width of `repair_orders.author_id`; conversation ids are stored there as the author. */
export const AUTHOR_ID_MAX_LENGTH = 255;

export interface IncomingMessage {
  conversationId: string;
  text: string;
  displayName: string;
  channel: Channel;
  /** Phone number the transport already knows the sender by (WhatsApp, SMS). */
  senderPhone?: string;
}

export type BotAction =
  | 'command'
  | 'intake'
  | 'awaiting-name'
  | 'diy-refusal'
  | 'phone-lead'
  | 'quick-intent'
  | 'faq'
  | 'assistant'
  | 'error';

export interface BotReply {
  conversationId: string;
  text: string;
  richFormatting: boolean;
  action: BotAction;
}
