import { LIMITS } from '../../config/constants.js';
import type { EncodingVariant } from '../../types/resolution.js';

export const LEGACY_MARKERS: readonly string[] = ['CBM', 'CWM'];

const ARTICLE_PATH = /\/articles\/(.+)$/;

/**
 * Returns the identifier following `/articles/` in the link's path, with the
 * query string excluded. Standard base64 identifiers may contain `/`, so the
 * whole remainder of the path is taken.
 */
export function extractArticleId(wrappedLink: string): string | null {
  if (!URL.canParse(wrappedLink)) return null;
  const { pathname } = new URL(wrappedLink);
  return ARTICLE_PATH.exec(pathname)?.[1] ?? null;
}

// The upstream scheme carries no version field. Both conditions are needed:
// long identifiers that still begin with a marker are redirect-based.
export function detectVariant(
  wrappedLink: string,
  legacyIdMaxLength: number = LIMITS.LEGACY_ID_MAX_LENGTH
): EncodingVariant {
  const articleId = extractArticleId(wrappedLink);
  if (
    articleId !== null &&
    LEGACY_MARKERS.some((marker) => articleId.startsWith(marker)) &&
    articleId.length < legacyIdMaxLength
  ) {
    return 'legacy-embedded';
  }
  return 'redirect-based';
}

export function isWrapperHost(
  wrappedLink: string,
  wrapperHosts: readonly string[]
): boolean {
  if (!URL.canParse(wrappedLink)) return false;
  const hostname = new URL(wrappedLink).hostname.toLowerCase();
  return wrapperHosts.some(
    (host) => hostname === host || hostname.endsWith(`.${host}`)
  );
}
