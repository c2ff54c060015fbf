import { DecodeError } from '../../errors/app-error.js';

const MARKER_LENGTH = 3;
const BASE64_BODY = /^[A-Za-z0-9+/_-]+={0,2}$/;

// Payloads are read as latin1 so each byte maps to exactly one char code.
const CONTROL_TERMINATED_URL =
  /([a-z][a-z0-9+.-]*:\/\/[^\x00-\x1f\x7f]+?)[\x00-\x1f\x7f]/;
// ASCII whitespace only: 0xA0 and 0x85 are UTF-8 continuation bytes.
const WHITESPACE_TERMINATED_URL = /([a-z][a-z0-9+.-]*:\/\/[^\t\n\v\f\r ]+)/;
const TRAILING_CONTROL = /[\x00-\x1f\x7f]+$/;

const KNOWN_SCHEMES: readonly string[] = [
  'https://',
  'http://',
  'ftp://',
  'ftps://',
];

function isControlCode(code: number): boolean {
  return code < 0x20 || code === 0x7f;
}

function scanForKnownScheme(text: string): string | null {
  const lowered = text.toLowerCase();
  let start = -1;
  for (const scheme of KNOWN_SCHEMES) {
    const position = lowered.indexOf(scheme);
    if (position >= 0 && (start < 0 || position < start)) start = position;
  }
  if (start < 0) return null;

  let end = start;
  while (end < text.length && !isControlCode(text.charCodeAt(end))) {
    end += 1;
  }
  return text.slice(start, end);
}

// A length byte in the letter range fuses onto the scheme ("ahttps://").
function trimSchemeNoise(candidate: string): string {
  const separator = candidate.indexOf('://');
  if (separator < 0) return candidate;

  const prefix = candidate.slice(0, separator + 3).toLowerCase();
  const known = [...KNOWN_SCHEMES]
    .sort((a, b) => b.length - a.length)
    .find((scheme) => prefix.endsWith(scheme));
  if (!known) return candidate;
  return candidate.slice(prefix.length - known.length);
}

/**
 * Pulls the first URL out of a decoded legacy payload. The record has no
 * published schema; URLs sit between control bytes. Returns null when no
 * candidate is found.
 */
export function extractUrlFromPayload(payload: Uint8Array): string | null {
  const text = Buffer.from(payload).toString('latin1');

  const candidate =
    CONTROL_TERMINATED_URL.exec(text)?.[1] ??
    WHITESPACE_TERMINATED_URL.exec(text)?.[1] ??
    scanForKnownScheme(text);
  if (!candidate) return null;

  const cleaned = trimSchemeNoise(candidate).replace(TRAILING_CONTROL, '');
  if (!cleaned) return null;
  return Buffer.from(cleaned, 'latin1').toString('utf8');
}

export function decodeLegacyIdentifier(
  articleId: string,
  wrappedLink: string
): Buffer {
  if (articleId.length <= MARKER_LENGTH) {
    throw new DecodeError(
      { kind: 'malformed-payload', reason: 'Article ID too short' },
      wrappedLink
    );
  }

  const body = articleId.slice(MARKER_LENGTH);
  const unpadded = body.replace(/=+$/, '');
  if (!BASE64_BODY.test(body) || unpadded.length % 4 === 1) {
    throw new DecodeError(
      {
        kind: 'malformed-payload',
        reason: 'Invalid base64 encoding in article ID',
      },
      wrappedLink
    );
  }

  const decoded = Buffer.from(body, 'base64');
  if (decoded.length === 0) {
    throw new DecodeError(
      { kind: 'malformed-payload', reason: 'Decoded payload is empty' },
      wrappedLink
    );
  }
  return decoded;
}

export function decodeLegacyLink(
  articleId: string,
  wrappedLink: string
): string {
  const payload = decodeLegacyIdentifier(articleId, wrappedLink);
  const url = extractUrlFromPayload(payload);
  if (!url) {
    throw new DecodeError(
      { kind: 'malformed-payload', reason: 'No URL found in decoded data' },
      wrappedLink
    );
  }
  return url;
}
