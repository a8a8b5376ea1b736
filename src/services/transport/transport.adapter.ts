/// <reference path="../../types/express.d.ts" />
import { Request } from 'express';
import { Channel } from '../../types/session';

export interface SendOptions {
  /** Render as HTML where the platform supports it. */
  richFormatting?: boolean;
}

export interface InboundMessage {
  conversationId: string;
  text: string;
  displayName: string;
  senderPhone?: string;
  timestamp: Date;
  provider: string;
}

/** The parts of an Express request a webhook signature check reads. */
export type WebhookRequest = Pick<Request, 'headers' | 'originalUrl' | 'body' | 'rawBody'>;

export interface TransportAdapter {
  readonly channel: Channel;
  sendText(conversationId: string, text: string, options?: SendOptions): Promise<boolean>;
  parseInbound(payload: unknown): InboundMessage[];
  validateWebhook(req: WebhookRequest): boolean;
}

export const SEND_ATTEMPTS = 3;

export function sendBackoff(attempt: number, baseDelayMs: number = 1000): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, baseDelayMs * Math.pow(2, attempt - 1)));
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
