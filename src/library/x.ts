import IPMatching from 'ip-matching';
import * as x from 'x-value';

export const IPPattern = x.string.refined<'ip pattern'>(value => {
  if (!isIP(value)) {
    throw new TypeError('Invalid IP address');
  }

  return value;
});

export const HTTPURL = x.string.refined<'http url'>(value => {
  if (!URL.canParse(value)) {
    throw new TypeError('Invalid URL');
  }

  const {protocol} = new URL(value);

  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new TypeError('Expecting an http or https URL');
  }

  return value;
});

export type HTTPURL = x.TypeOf<typeof HTTPURL>;

export const ListeningHost = x.union([IPPattern, x.literal('')]);

export type ListeningHost = x.TypeOf<typeof ListeningHost>;

export const Port = x.integerRange<'port'>({min: 1, max: 65535});

export type Port = x.TypeOf<typeof Port>;

export const IntervalMinutes = x.integerRange<'interval minutes'>({min: 1});

export type IntervalMinutes = x.TypeOf<typeof IntervalMinutes>;

export function isIP(value: string): boolean {
  return getIPFamily(value) !== undefined;
}

export function getIPFamily(value: string): 'IPv4' | 'IPv6' | undefined {
  let ip: ReturnType<typeof IPMatching.getIP>;

  try {
    ip = IPMatching.getIP(value);
  } catch {
    return undefined;
  }

  return ip instanceof IPMatching.IPv4
    ? 'IPv4'
    : ip instanceof IPMatching.IPv6
      ? 'IPv6'
      : undefined;
}
