import {normalizeDomains} from '../library/index.js';

test('normalizes labels', () => {
  expect(normalizeDomains(' Home.casadns.eu , SERVER ,,office ')).toBe(
    'home,server,office',
  );
});

test('keeps order and duplicates', () => {
  expect(normalizeDomains('b,a,b')).toBe('b,a,b');
});

test('drops empty labels', () => {
  expect(normalizeDomains(',, ,')).toBe('');
  expect(normalizeDomains('.casadns.eu,home')).toBe('home');
});

test('strips repeated suffixes', () => {
  expect(normalizeDomains('home.casadns.eu.casadns.eu')).toBe('home');
  expect(normalizeDomains('home .CASADNS.EU')).toBe('home');
});

test('leaves other suffixes alone', () => {
  expect(normalizeDomains('home.example.com')).toBe('home.example.com');
});

test('is idempotent', () => {
  for (const raw of [
    ' Home.casadns.eu , SERVER ,,office ',
    'a.casadns.eu.casadns.eu, b ',
    'x .casadns.eu,,',
    '',
  ]) {
    const normalized = normalizeDomains(raw);
    expect(normalizeDomains(normalized)).toBe(normalized);
  }
});
