import { PREBASE_MARKER, PREBASE_VOWEL_SIGN } from './tables';

/**
 * Move a pre-base vowel sign after the character it was typed in front of.
 *
 * `f` + X becomes X + `ि`. A marker with nothing after it stays where it is.
 * Works on code points, in a single forward pass.
 */
export function reorderPrebaseVowelSign(
  text: string,
  marker: string = PREBASE_MARKER,
  vowelSign: string = PREBASE_VOWEL_SIGN
): string {
  const chars = Array.from(text);

  let i = 0;
  while (i < chars.length) {
    if (chars[i] === marker && i + 1 < chars.length) {
      chars[i] = chars[i + 1];
      chars[i + 1] = vowelSign;
      i += 2;
      continue;
    }
    i++;
  }

  return chars.join('');
}
