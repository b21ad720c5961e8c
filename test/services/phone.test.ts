import { describe, it, expect, beforeEach } from 'vitest';
import { PhoneClient, normalizePhone, scorePhone } from '../../src/services/sources/phone.js';
import { createDeps, createMockHttp, httpOk, httpTimeout, providerRecord } from '../helpers/fixtures.js';

describe('normalizePhone', () => {
  it('strips formatting', () => {
    expect(normalizePhone('(217) 555-0100')).toBe('2175550100');
  });

  it('drops a leading US country code', () => {
    expect(normalizePhone('+1 217 555 0100')).toBe('2175550100');
  });

  it('returns null for fewer than ten digits', () => {
    expect(normalizePhone('555-0100')).toBeNull();
  });
});

describe('scorePhone', () => {
  it.each([
    ['mobile', 'Example Telecom', 85],
    ['landline', '', 85],
    ['voip', '', 70],
    ['voip', 'Example Telecom', 85],
    ['unknown', 'Example Telecom', 70],
    ['unknown', '', 20],
    ['toll_free', '', 70],
  ])('scores line type %s with carrier "%s" as %i', (lineType, carrier, expected) => {
    expect(scorePhone(lineType, carrier)).toBe(expected);
  });
});

describe('PhoneClient.check', () => {
  let http: ReturnType<typeof createMockHttp>;
  let client: PhoneClient;

  beforeEach(() => {
    http = createMockHttp();
    client = new PhoneClient(createDeps(http), 'test-key');
  });

  it('confirms a landline with carrier at 85', async () => {
    http.get.mockResolvedValue(
      httpOk({
        valid: true,
        line_type: 'landline',
        carrier: 'Example Telecom',
        country_name: 'United States of America',
        country_code: 'US',
        local_format: '2175550100',
        international_format: '+12175550100',
      }),
    );

    const result = await client.check(providerRecord({ phone: '+1 (217) 555-0100' }));

    expect(result.valid).toBe(true);
    expect(result.confidence).toBe(85);
    expect(result.verifiedData).toEqual({
      number: '2175550100',
      country: 'United States of America',
      countryCode: 'US',
      carrier: 'Example Telecom',
      lineType: 'landline',
      localFormat: '2175550100',
      internationalFormat: '+12175550100',
    });
    expect(http.get).toHaveBeenCalledWith('http://apilayer.net/api/validate', {
      params: { access_key: 'test-key', number: '2175550100', country_code: 'US', format: 1 },
      signal: undefined,
    });
  });

  it('scores a valid number with unknown line type and no carrier as likely disconnected', async () => {
    http.get.mockResolvedValue(httpOk({ valid: true, line_type: null, carrier: null }));

    const result = await client.check(providerRecord({ phone: '555-555-5555' }));

    expect(result.valid).toBe(true);
    expect(result.confidence).toBe(20);
    expect(result.verifiedData?.lineType).toBe('unknown');
    expect(result.verifiedData?.carrier).toBe('');
  });

  it('rejects an invalid number at 40', async () => {
    http.get.mockResolvedValue(httpOk({ valid: false }));

    const result = await client.check(providerRecord());

    expect(result.valid).toBe(false);
    expect(result.confidence).toBe(40);
    expect(result.error).toBe('Phone number is not valid');
  });

  it('rejects a missing phone without a request', async () => {
    const result = await client.check(providerRecord({ phone: '  ' }));

    expect(result.error).toBe('No phone number provided');
    expect(result.confidence).toBe(40);
    expect(http.get).not.toHaveBeenCalled();
  });

  it('rejects a short phone without a request', async () => {
    const result = await client.check(providerRecord({ phone: '555-0100' }));

    expect(result.error).toBe('Invalid phone format');
    expect(http.get).not.toHaveBeenCalled();
  });

  it('reports an error body from the service as a request failure', async () => {
    http.get.mockResolvedValue(httpOk({ success: false, error: { info: 'Invalid access key' } }));

    const result = await client.check(providerRecord());

    expect(result.confidence).toBe(50);
    expect(result.error).toBe('API request failed: Invalid access key');
  });

  it('reports transport failures at 50', async () => {
    http.get.mockResolvedValue(httpTimeout());

    const result = await client.check(providerRecord());

    expect(result.valid).toBe(false);
    expect(result.confidence).toBe(50);
    expect(result.verifiedData).toBeNull();
    expect(http.get).toHaveBeenCalledTimes(3);
  });
});
