import {
  CASADNS_ENDPOINT_DEFAULT,
  CasaDNSClient,
  buildUpdateURL,
} from '../library/index.js';

import {FakeHTTPClient, TEST_TOKEN} from './@fakes.js';

const DOMAINS = 'home,server';

describe('buildUpdateURL', () => {
  test('includes both addresses', () => {
    const url = buildUpdateURL(CASADNS_ENDPOINT_DEFAULT, {
      domains: DOMAINS,
      token: TEST_TOKEN,
      ipv4: '1.2.3.4',
      ipv6: '::1',
    });

    expect(`${url.origin}${url.pathname}`).toBe('https://casadns.eu/update');
    expect([...url.searchParams]).toEqual([
      ['domains', 'home,server'],
      ['token', 'test-token'],
      ['clear', 'true'],
      ['ip', '1.2.3.4'],
      ['ipv6', '::1'],
    ]);
  });

  test('uses IPv6 as ip without IPv4', () => {
    const url = buildUpdateURL(CASADNS_ENDPOINT_DEFAULT, {
      domains: DOMAINS,
      token: TEST_TOKEN,
      ipv4: undefined,
      ipv6: '::1',
    });

    expect(url.searchParams.get('ip')).toBe('::1');
    expect(url.searchParams.get('ipv6')).toBe('::1');
    expect(url.searchParams.get('clear')).toBe('true');
  });

  test('omits ipv6 without IPv6', () => {
    const url = buildUpdateURL(CASADNS_ENDPOINT_DEFAULT, {
      domains: DOMAINS,
      token: TEST_TOKEN,
      ipv4: '9.9.9.9',
      ipv6: undefined,
    });

    expect(url.searchParams.get('ip')).toBe('9.9.9.9');
    expect(url.searchParams.has('ipv6')).toBe(false);
  });

  test('encodes token', () => {
    const url = buildUpdateURL('http://localhost:8000/update', {
      domains: DOMAINS,
      token: 'a&b=c',
      ipv4: '9.9.9.9',
      ipv6: undefined,
    });

    expect(url.searchParams.get('token')).toBe('a&b=c');
    expect(url.host).toBe('localhost:8000');
  });
});

describe('CasaDNSClient', () => {
  test('pushes with headers and timeout', async () => {
    const http = new FakeHTTPClient(() => ({status: 200, text: 'OK'}));

    const client = new CasaDNSClient(http);

    const outcome = await client.push({
      domains: DOMAINS,
      token: TEST_TOKEN,
      ipv4: '1.2.3.4',
      ipv6: undefined,
    });

    expect(outcome).toEqual({type: 'response', status: 200, text: 'OK'});

    expect(http.requests).toHaveLength(1);

    const [{url, options}] = http.requests;

    expect(url.searchParams.get('ip')).toBe('1.2.3.4');
    expect(options).toEqual({
      headers: {
        'Content-Type': 'text/html',
        'User-Agent': 'casadns-updater/0.1.0',
      },
      timeout: 10_000,
    });
  });

  test('reports non-200 responses as responses', async () => {
    const http = new FakeHTTPClient(() => ({status: 401, text: 'bad token'}));

    const outcome = await new CasaDNSClient(http).push({
      domains: DOMAINS,
      token: TEST_TOKEN,
      ipv4: '1.2.3.4',
      ipv6: undefined,
    });

    expect(outcome).toEqual({type: 'response', status: 401, text: 'bad token'});
  });

  test('reports transport failures as errors', async () => {
    const http = new FakeHTTPClient(() => new Error('connect ECONNREFUSED'));

    const outcome = await new CasaDNSClient(http).push({
      domains: DOMAINS,
      token: TEST_TOKEN,
      ipv4: '1.2.3.4',
      ipv6: undefined,
    });

    expect(outcome).toEqual({type: 'error', error: 'connect ECONNREFUSED'});
  });

  test('reports a malformed endpoint as an error', async () => {
    const http = new FakeHTTPClient(() => ({status: 200, text: 'OK'}));

    const outcome = await new CasaDNSClient(http, 'casadns.eu/update').push({
      domains: DOMAINS,
      token: TEST_TOKEN,
      ipv4: '1.2.3.4',
      ipv6: undefined,
    });

    expect(outcome.type).toBe('error');
    expect(http.requests).toHaveLength(0);
  });

  test('uses custom endpoint', async () => {
    const http = new FakeHTTPClient(() => ({status: 200, text: 'OK'}));

    await new CasaDNSClient(http, 'http://127.0.0.1:9000/update').push({
      domains: DOMAINS,
      token: TEST_TOKEN,
      ipv4: undefined,
      ipv6: '2001:db8::1',
    });

    expect(http.requests[0].url.href).toBe(
      'http://127.0.0.1:9000/update?domains=home%2Cserver&token=test-token&clear=true&ip=2001%3Adb8%3A%3A1&ipv6=2001%3Adb8%3A%3A1',
    );
  });
});
