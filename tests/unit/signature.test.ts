import crypto from 'crypto';
import { readSignature, verifyHmac } from '../../src/middleware/signature';
import { parseApiKeys } from '../../src/middleware/auth';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const body = Buffer.from('{"event":"lead.updated","id":4711}');
const digest = crypto.createHmac('sha256', 'test-secret').update(body).digest('hex');

describe('CRM webhook signature', () => {
  it('reads the first signature header present and drops the prefix', () => {
    expect(readSignature({ headers: { 'x-hub-signature-256': `sha256=${digest}` } })).toBe(digest);
    expect(readSignature({ headers: { 'x-signature': 'abc', 'x-crm-signature': 'def' } })).toBe('def');
    expect(readSignature({ headers: {} })).toBeNull();
  });

  it('accepts the HMAC of the raw body in any case', () => {
    expect(verifyHmac('test-secret', body, digest)).toBe(true);
    expect(verifyHmac('test-secret', body, digest.toUpperCase())).toBe(true);
  });

  it('rejects a wrong secret or a tampered body', () => {
    expect(verifyHmac('other-secret', body, digest)).toBe(false);
    expect(verifyHmac('test-secret', Buffer.from('{}'), digest)).toBe(false);
    expect(verifyHmac('test-secret', body, 'short')).toBe(false);
  });
});

describe('API key auth', () => {
  it('parses a comma separated key list', () => {
    expect(parseApiKeys(' key-1, ,key-2 ')).toEqual(new Set(['key-1', 'key-2']));
    expect(parseApiKeys(undefined).size).toBe(0);
  });
});
