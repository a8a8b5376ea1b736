const mockSendMessage = jest.fn();
const mockSetWebhook = jest.fn();

jest.mock('telegraf', () => ({
  Telegraf: jest.fn(() => ({
    telegram: { sendMessage: mockSendMessage, setWebhook: mockSetWebhook },
  })),
}));

const mockCreateMessage = jest.fn();
const mockValidateRequest = jest.fn();

jest.mock('twilio', () =>
  Object.assign(
    jest.fn(() => ({ messages: { create: mockCreateMessage } })),
    { validateRequest: mockValidateRequest }
  )
);

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import crypto from 'crypto';
import { TelegramAdapter } from '../../src/services/transport/telegram.adapter';
import { WhatsAppCloudAdapter } from '../../src/services/transport/whatsapp.adapter';
import { TwilioAdapter } from '../../src/services/transport/twilio.adapter';
import { TransportError } from '../../src/utils/errors';

const mockFetch = jest.fn();
global.fetch = mockFetch;

describe('Transport adapters', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('TelegramAdapter', () => {
    const update = {
      update_id: 1,
      message: {
        date: 1700000000,
        chat: { id: 42 },
        from: { id: 7, first_name: 'John', last_name: 'Smith' },
        text: 'hi',
      },
    };

    it('requires a bot token', () => {
      expect(() => new TelegramAdapter({ webhookSecret: 'test-secret' })).toThrow(TransportError);
    });

    it('refuses to run without a webhook secret', () => {
      expect(() => new TelegramAdapter({ botToken: 'test-token' })).toThrow(TransportError);
    });

    it('parses a text update', () => {
      const adapter = new TelegramAdapter({ botToken: 'test-token', webhookSecret: 'test-secret' });

      expect(adapter.parseInbound(update)).toEqual([
        {
          conversationId: '42',
          text: 'hi',
          displayName: 'John Smith',
          timestamp: new Date(1700000000 * 1000),
          provider: 'telegram',
        },
      ]);
    });

    it('ignores updates without text', () => {
      const adapter = new TelegramAdapter({ botToken: 'test-token', webhookSecret: 'test-secret' });

      expect(adapter.parseInbound({ update_id: 2, message: { chat: { id: 42 } } })).toEqual([]);
      expect(adapter.parseInbound({ nonsense: true })).toEqual([]);
    });

    it('sends rich replies as HTML', async () => {
      mockSendMessage.mockResolvedValueOnce({ message_id: 1 });
      const adapter = new TelegramAdapter({ botToken: 'test-token', webhookSecret: 'test-secret' });

      await expect(adapter.sendText('42', '<code>42</code>', { richFormatting: true })).resolves.toBe(true);
      expect(mockSendMessage).toHaveBeenCalledWith('42', '<code>42</code>', { parse_mode: 'HTML' });
    });

    it('reports failure after three attempts', async () => {
      mockSendMessage.mockRejectedValue(new Error('network down'));
      const adapter = new TelegramAdapter({ botToken: 'test-token', webhookSecret: 'test-secret', retryDelayMs: 0 });

      await expect(adapter.sendText('42', 'hello')).resolves.toBe(false);
      expect(mockSendMessage).toHaveBeenCalledTimes(3);
      mockSendMessage.mockReset();
    });

    it('registers the webhook with its secret', async () => {
      const adapter = new TelegramAdapter({ botToken: 'test-token', webhookSecret: 'test-secret' });

      await adapter.registerWebhook('https://bot.test/webhook/telegram');

      expect(mockSetWebhook).toHaveBeenCalledWith('https://bot.test/webhook/telegram', { secret_token: 'test-secret' });
    });

    it('checks the secret header', () => {
      const adapter = new TelegramAdapter({ botToken: 'test-token', webhookSecret: 'test-secret' });
      const request = (secret?: string) => ({
        headers: secret ? { 'x-telegram-bot-api-secret-token': secret } : {},
        originalUrl: '/webhook/telegram',
        body: update,
      });

      expect(adapter.validateWebhook(request('test-secret'))).toBe(true);
      expect(adapter.validateWebhook(request('wrong-secret'))).toBe(false);
      expect(adapter.validateWebhook(request())).toBe(false);
    });
  });

  describe('WhatsAppCloudAdapter', () => {
    const payload = {
      entry: [
        {
          changes: [
            {
              value: {
                contacts: [{ wa_id: '27821234567', profile: { name: 'Thandi' } }],
                messages: [
                  { from: '27821234567', type: 'text', timestamp: '1700000000', text: { body: 'hello' } },
                  { from: '27821234567', type: 'image', timestamp: '1700000001' },
                ],
              },
            },
          ],
        },
      ],
    };

    function adapter() {
      return new WhatsAppCloudAdapter({
        token: 'test-token',
        phoneId: '100',
        verifyToken: 'test-verify',
        appSecret: 'test-secret',
        retryDelayMs: 0,
      });
    }

    it('answers the verification handshake', () => {
      expect(adapter().verifySubscription('subscribe', 'test-verify', '12345')).toBe('12345');
      expect(adapter().verifySubscription('subscribe', 'wrong', '12345')).toBeNull();
    });

    it('parses text messages and skips media', () => {
      expect(adapter().parseInbound(payload)).toEqual([
        {
          conversationId: '27821234567',
          text: 'hello',
          displayName: 'Thandi',
          senderPhone: '+27821234567',
          timestamp: new Date(1700000000 * 1000),
          provider: 'whatsapp',
        },
      ]);
    });

    it('verifies the payload signature', () => {
      const rawBody = Buffer.from(JSON.stringify(payload));
      const signature = crypto.createHmac('sha256', 'test-secret').update(rawBody).digest('hex');
      const request = (header: string) => ({
        headers: { 'x-hub-signature-256': header },
        originalUrl: '/webhook/whatsapp',
        body: payload,
        rawBody,
      });

      expect(adapter().validateWebhook(request(`sha256=${signature}`))).toBe(true);
      expect(adapter().validateWebhook(request('sha256=deadbeef'))).toBe(false);
    });

    it('sends a text message through the Graph API', async () => {
      mockFetch.mockResolvedValueOnce({ ok: true, status: 200, text: async () => '{}' });

      await expect(adapter().sendText('27821234567', 'hello')).resolves.toBe(true);

      const [url, options] = mockFetch.mock.calls[0];
      expect(url).toBe('https://graph.facebook.com/v20.0/100/messages');
      expect(options.headers['Authorization']).toBe('Bearer test-token');
      expect(JSON.parse(options.body)).toEqual({
        messaging_product: 'whatsapp',
        to: '27821234567',
        text: { body: 'hello' },
      });
    });

    it('does not retry a rejected request', async () => {
      mockFetch.mockResolvedValue({ ok: false, status: 400, text: async () => 'bad recipient' });

      await expect(adapter().sendText('27821234567', 'hello')).resolves.toBe(false);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('retries server errors up to three times', async () => {
      mockFetch.mockResolvedValue({ ok: false, status: 500, text: async () => 'oops' });

      await expect(adapter().sendText('27821234567', 'hello')).resolves.toBe(false);
      expect(mockFetch).toHaveBeenCalledTimes(3);
    });
  });

  describe('TwilioAdapter', () => {
    function adapter() {
      return new TwilioAdapter({
        accountSid: 'AC123',
        authToken: 'test-token',
        phoneNumber: '+15550001234',
        webhookBaseUrl: 'https://bot.test',
        retryDelayMs: 0,
      });
    }

    it('parses a WhatsApp message relayed by Twilio', () => {
      const [message] = adapter().parseInbound({ From: 'whatsapp:+27821234567', Body: 'hi', ProfileName: 'Thandi' });

      expect(message).toMatchObject({
        conversationId: 'whatsapp:+27821234567',
        text: 'hi',
        displayName: 'Thandi',
        senderPhone: '+27821234567',
        provider: 'twilio',
      });
    });

    it('replies from the WhatsApp sender for WhatsApp conversations', async () => {
      mockCreateMessage.mockResolvedValueOnce({ sid: 'SM123' });

      await expect(adapter().sendText('whatsapp:+27821234567', 'hello')).resolves.toBe(true);
      expect(mockCreateMessage).toHaveBeenCalledWith({
        to: 'whatsapp:+27821234567',
        from: 'whatsapp:+15550001234',
        body: 'hello',
      });
    });

    it('replies from the plain number for SMS', async () => {
      mockCreateMessage.mockResolvedValueOnce({ sid: 'SM124' });

      await adapter().sendText('+27821234567', 'hello');
      expect(mockCreateMessage).toHaveBeenCalledWith({ to: '+27821234567', from: '+15550001234', body: 'hello' });
    });

    it('validates the signature against the public URL', () => {
      mockValidateRequest.mockReturnValueOnce(true);
      const body = { From: '+27821234567', Body: 'hi' };

      const valid = adapter().validateWebhook({
        headers: { 'x-twilio-signature': 'sig' },
        originalUrl: '/webhook/twilio',
        body,
      });

      expect(valid).toBe(true);
      expect(mockValidateRequest).toHaveBeenCalledWith('test-token', 'sig', 'https://bot.test/webhook/twilio', body);
    });

    it('rejects a request without a signature', () => {
      expect(adapter().validateWebhook({ headers: {}, originalUrl: '/webhook/twilio', body: {} })).toBe(false);
    });
  });
});
