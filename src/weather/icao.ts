const ICAO_PATTERN = /^[A-Z]{4}$/i;

export type IcaoParseResult = { ok: true; code: string } | { ok: false };

/**
 * Accepts exactly four ASCII letters, any case, surrounded by optional
 * whitespace. The shape is checked before upper-casing so that letters
 * like 'ß' cannot expand into a valid code.
 */
export function parseIcaoCode(text: string): IcaoParseResult {
  const trimmed = text.trim();
  if (!ICAO_PATTERN.test(trimmed)) return { ok: false };
  return { ok: true, code: trimmed.toUpperCase() };
}
