const INTERNATIONAL_PATTERN = /^\+\d{8,20}$/;
const URL_PATTERN = /https?:\/\/\S+/;
const FIRST_NAME_SLOT = /\{first_name\}/g;

export const DEFAULT_LINK_FIELD = 'cid';

export interface UrlMatch {
  url: string;
  start: number;
  end: number;
}

export interface RenderOptions {
  trackLink: boolean;
  linkFieldName?: string;
}

/** Strip every non-digit character. */
export function digitsOnly(value: string | null | undefined): string {
  return (value ?? '').replace(/\D/g, '');
}

/**
 * Canonicalize a raw phone value into `+<digits>` form.
 *
 * Pre-formatted international numbers are accepted as-is (whitespace removed);
 * bare numbers are disambiguated by digit count. Returns null when no rule applies.
 */
export function normalizePhone(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) {
    return null;
  }

  const trimmed = raw.trim();
  if (INTERNATIONAL_PATTERN.test(trimmed.replace(/ /g, ''))) {
    return trimmed.replace(/\s+/g, '');
  }

  const digits = digitsOnly(trimmed);
  if (digits.length === 11 && digits.startsWith('1')) {
    return `+${digits}`;
  }
  // A leading 0 marks a trunk prefix, not a local number.
  if (digits.length === 10 && !digits.startsWith('0')) {
    return `+1${digits}`;
  }
  if (digits.length >= 8 && digits.length <= 15 && !digits.startsWith('0')) {
    return `+${digits}`;
  }
  return null;
}

export function findFirstUrl(text: string): UrlMatch | null {
  const match = URL_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  return { url: match[0], start: match.index, end: match.index + match[0].length };
}

/**
 * Set a single query parameter, leaving scheme, host, path and fragment as written.
 * An existing value for `key` is overwritten in place; other parameters keep their order.
 */
export function addQueryParam(url: string, key: string, value: string): string {
  const hashIndex = url.indexOf('#');
  const fragment = hashIndex >= 0 ? url.slice(hashIndex) : '';
  const withoutFragment = hashIndex >= 0 ? url.slice(0, hashIndex) : url;

  const queryIndex = withoutFragment.indexOf('?');
  const base = queryIndex >= 0 ? withoutFragment.slice(0, queryIndex) : withoutFragment;
  const query = queryIndex >= 0 ? withoutFragment.slice(queryIndex + 1) : '';

  const params = new URLSearchParams(query);
  params.set(key, value);
  return `${base}?${params.toString()}${fragment}`;
}

/** Rewrite the first URL in `text` to carry the digits of `identity`. */
export function personalizeLink(
  text: string,
  identity: string,
  fieldName: string = DEFAULT_LINK_FIELD,
): string {
  const match = findFirstUrl(text);
  if (!match) {
    return text;
  }
  const rewritten = addQueryParam(match.url, fieldName, digitsOnly(identity));
  return `${text.slice(0, match.start)}${rewritten}${text.slice(match.end)}`;
}

export function renderMessage(
  template: string,
  firstName: string,
  identity: string,
  options: RenderOptions,
): string {
  const body = template.replace(FIRST_NAME_SLOT, () => firstName);
  if (!options.trackLink) {
    return body;
  }
  return personalizeLink(body, identity, options.linkFieldName ?? DEFAULT_LINK_FIELD);
}
