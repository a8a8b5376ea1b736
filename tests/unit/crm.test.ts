import { RoAppAdapter } from '../../src/services/crm/roapp.adapter';
import { CRMFactory } from '../../src/services/crm/crm.adapter';
import { HttpError } from '../../src/utils/errors';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

// Mock global fetch
const mockFetch = jest.fn();
global.fetch = mockFetch;

describe('CRM Factory', () => {
  it('should create RO App adapter', () => {
    const adapter = CRMFactory.create('roapp', { apiKey: 'test-key' });
    expect(adapter).toBeInstanceOf(RoAppAdapter);
  });

  it('should throw for unsupported CRM type', () => {
    expect(() => CRMFactory.create('salesforce', {})).toThrow('Unsupported CRM type: salesforce');
  });
});

describe('RoAppAdapter', () => {
  let adapter: RoAppAdapter;

  beforeEach(() => {
    jest.clearAllMocks();
    adapter = new RoAppAdapter({ apiKey: 'test-api-key', baseUrl: 'https://crm.test/' });
  });

  it('should create an inquiry', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => ({ id: 4711, status: 'new' }),
    });

    const result = await adapter.createInquiry({
      phone: '+27821234567',
      name: 'John',
      title: 'Motorcycle repair request',
      description: 'Source: Telegram.',
      locationId: 12,
      channel: 'Telegram',
    });

    expect(result).toEqual({ id: '4711', status: 'new' });
    expect(mockFetch).toHaveBeenCalledTimes(1);

    const [url, options] = mockFetch.mock.calls[0];
    expect(url).toBe('https://crm.test/lead/');
    expect(options.method).toBe('POST');
    expect(options.headers['Authorization']).toBe('Bearer test-api-key');

    expect(JSON.parse(options.body)).toEqual({
      contact_phone: '+27821234567',
      contact_name: 'John',
      title: 'Motorcycle repair request',
      description: 'Source: Telegram.',
      location_id: 12,
      channel: 'Telegram',
    });
  });

  it('should leave out optional fields', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => ({ id: 'L-1' }) });

    await adapter.createInquiry({ phone: '+27821234567', name: 'John', title: '' });

    const [, options] = mockFetch.mock.calls[0];
    expect(JSON.parse(options.body)).toEqual({
      contact_phone: '+27821234567',
      contact_name: 'John',
      title: 'Incoming request',
    });
  });

  it('should throw HttpError with the response body', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 422,
      text: async () => '{"error":"invalid phone"}',
    });

    const error = await adapter
      .createInquiry({ phone: '+27821234567', name: 'John', title: 'x' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 422, body: '{"error":"invalid phone"}' });
  });

  it('should reject a response without an id', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => ({ status: 'new' }) });

    await expect(adapter.createInquiry({ phone: '+27821234567', name: 'John', title: 'x' })).rejects.toThrow(
      'RO App returned a lead without an id'
    );
  });
});
