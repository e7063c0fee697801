/**
 * Language detection
 *
 * Statistical trigram detection (franc) over extracted text, restricted to
 * commonly published languages, with the document's declared language as
 * the fallback for short texts.
 */

import { francAll } from 'franc';
import { iso6393To1 } from 'iso-639-3';

/** ISO 639-3 codes considered during detection */
const CANDIDATE_LANGUAGES = [
  'eng', 'spa', 'fra', 'deu', 'ita', 'por', 'nld', 'swe', 'nob', 'dan',
  'fin', 'pol', 'ces', 'ron', 'hun', 'rus', 'ukr', 'tur', 'ell', 'arb',
  'heb', 'hin', 'jpn', 'kor', 'cmn', 'vie', 'ind', 'tha',
];

// Individual codes whose ISO 639-1 code belongs to the macrolanguage
const MACROLANGUAGE_CODES: Record<string, string> = {
  arb: 'ar',
  cmn: 'zh',
  nob: 'no',
};

/** Confidence assigned when only the declared language is available */
export const DECLARED_LANGUAGE_CONFIDENCE = 0.5;

export interface LanguageGuess {
  language?: string;
  /** 0 when nothing is known */
  confidence: number;
  method: 'statistical' | 'declared' | 'none';
}

/**
 * Normalize a declared tag such as `en-US` or `EN` to `en`
 */
export function normalizeLanguageTag(tag: string | undefined): string | undefined {
  if (!tag) return undefined;
  const primary = tag.trim().split(/[-_]/)[0]?.toLowerCase();
  return primary && /^[a-z]{2,3}$/.test(primary) ? primary : undefined;
}

function toIso6391(code: string): string {
  return MACROLANGUAGE_CODES[code] ?? iso6393To1[code] ?? code;
}

export function detectLanguage(
  text: string,
  declared: string | undefined,
  options: { enabled: boolean; minLength: number }
): LanguageGuess {
  const declaredTag = normalizeLanguageTag(declared);
  const fallback: LanguageGuess = declaredTag
    ? { language: declaredTag, confidence: DECLARED_LANGUAGE_CONFIDENCE, method: 'declared' }
    : { confidence: 0, method: 'none' };

  if (!options.enabled || text.length < options.minLength) return fallback;

  const ranked = francAll(text, { only: CANDIDATE_LANGUAGES, minLength: options.minLength });
  const [best, runnerUp] = ranked;
  if (!best || best[0] === 'und') return fallback;

  // franc scores the best match 1; distance to the runner-up is the margin
  const confidence = runnerUp ? Math.max(0, Math.min(1, 1 - runnerUp[1])) : 1;
  return { language: toIso6391(best[0]), confidence, method: 'statistical' };
}
