/**
 * UTF-16 cut helpers. Cutting a string between the halves of a surrogate
 * pair leaves lone surrogates that backends reject or mangle.
 */

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Whether `index` falls between the two halves of a surrogate pair */
export function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  return isHighSurrogate(text.charCodeAt(index - 1)) && isLowSurrogate(text.charCodeAt(index));
}

/** The largest cut at or below `index` that keeps every code point whole */
export function codePointBoundary(text: string, index: number): number {
  return splitsSurrogatePair(text, index) ? index - 1 : index;
}
