import { describe, expect, it } from 'vitest';
import {
  addQueryParam,
  digitsOnly,
  findFirstUrl,
  normalizePhone,
  personalizeLink,
  renderMessage,
} from '../../src/services/identity-normalizer.js';

describe('normalizePhone', () => {
  it('prefixes +1 to ten-digit local numbers', () => {
    expect(normalizePhone('(555) 123-4567')).toBe('+15551234567');
    expect(normalizePhone('555.123.4567')).toBe('+15551234567');
  });

  it('prefixes + to eleven-digit numbers that start with 1', () => {
    expect(normalizePhone('15551234567')).toBe('+15551234567');
    expect(normalizePhone('+1 (555) 123-4567')).toBe('+15551234567');
  });

  it('keeps pre-formatted international numbers, removing whitespace', () => {
    expect(normalizePhone('+44 7911 123456')).toBe('+447911123456');
    expect(normalizePhone('  +33612345678 ')).toBe('+33612345678');
  });

  it('prefixes + to other 8-15 digit numbers without a leading zero', () => {
    expect(normalizePhone('44 20 7946 0958')).toBe('+442079460958');
    expect(normalizePhone('61412345')).toBe('+61412345');
  });

  it('rejects values no rule accepts', () => {
    expect(normalizePhone('12')).toBeNull();
    expect(normalizePhone('abc')).toBeNull();
    expect(normalizePhone('0123456789')).toBeNull();
    expect(normalizePhone('')).toBeNull();
    expect(normalizePhone(null)).toBeNull();
    expect(normalizePhone(undefined)).toBeNull();
    expect(normalizePhone('1234567890123456')).toBeNull();
  });
});

describe('digitsOnly', () => {
  it('strips everything but digits', () => {
    expect(digitsOnly('+1 (555) 123-4567')).toBe('15551234567');
    expect(digitsOnly(null)).toBe('');
  });
});

describe('findFirstUrl', () => {
  it('returns the first http(s) URL and its span', () => {
    expect(findFirstUrl('Visit https://a.com/x now or http://b.com')).toEqual({
      url: 'https://a.com/x',
      start: 6,
      end: 21,
    });
  });

  it('returns null when there is no URL', () => {
    expect(findFirstUrl('no links here')).toBeNull();
  });
});

describe('addQueryParam', () => {
  it('overwrites an existing value and keeps other parameters and the fragment', () => {
    expect(addQueryParam('https://example.com/offer?utm=sms&cid=old#top', 'cid', '15551234567')).toBe(
      'https://example.com/offer?utm=sms&cid=15551234567#top',
    );
  });

  it('adds a query string to a bare URL without touching the path', () => {
    expect(addQueryParam('https://example.com', 'cid', '1')).toBe('https://example.com?cid=1');
    expect(addQueryParam('https://example.com/a/b', 'ref', '42')).toBe('https://example.com/a/b?ref=42');
  });
});

describe('personalizeLink', () => {
  it('leaves messages without a URL unchanged', () => {
    const message = 'Hi Ana, see you soon';
    expect(personalizeLink(message, '+15551234567')).toBe(message);
  });

  it('rewrites only the first URL', () => {
    expect(
      personalizeLink('A https://a.com/x?cid=9&lang=en then https://b.com/y', '+15551234567'),
    ).toBe('A https://a.com/x?cid=15551234567&lang=en then https://b.com/y');
  });

  it('uses the configured parameter name', () => {
    expect(personalizeLink('Go: https://a.com/p', '+447911123456', 'ref')).toBe(
      'Go: https://a.com/p?ref=447911123456',
    );
  });
});

describe('renderMessage', () => {
  it('fills the first_name slot and tracks the link when enabled', () => {
    expect(
      renderMessage('Hi {first_name}, see https://ex.com/p?a=1', 'Ana', '+15551234567', { trackLink: true }),
    ).toBe('Hi Ana, see https://ex.com/p?a=1&cid=15551234567');
  });

  it('leaves links alone when tracking is disabled', () => {
    expect(
      renderMessage('Hi {first_name}, see https://ex.com/p', 'Ana', '+15551234567', { trackLink: false }),
    ).toBe('Hi Ana, see https://ex.com/p');
  });

  it('inserts names literally, including replacement patterns', () => {
    expect(renderMessage('{first_name}!', '$&', '+15551234567', { trackLink: false })).toBe('$&!');
  });

  it('produces identical output when rendered twice', () => {
    const render = () =>
      renderMessage('Hey {first_name} https://ex.com/?cid=1', 'Bo', '+15551234567', {
        trackLink: true,
        linkFieldName: 'cid',
      });
    expect(render()).toBe(render());
    expect(render()).toBe('Hey Bo https://ex.com/?cid=15551234567');
  });
});
