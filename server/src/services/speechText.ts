const QUOTED_SPAN_PATTERN = /'.*?'|".*?"/g;

const EMOJI_PATTERN =
  /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F700}-\u{1F77F}\u{1F780}-\u{1F7FF}\u{1F800}-\u{1F8FF}\u{1F900}-\u{1F9FF}\u{1FA00}-\u{1FA6F}\u{1FA70}-\u{1FAFF}\u{2702}-\u{27B0}\u{24C2}-\u{1F251}]+/gu;

/**
 * Reduces a reply to the part that should be spoken: everything from the first `(` on is
 * a stage direction, quoted asides are dropped, and emoji are removed. Truncation runs first.
 */
export function toSpeechText(text: string): string {
  let speech = text;

  const parenIndex = speech.indexOf("(");
  if (parenIndex !== -1) {
    speech = speech.slice(0, parenIndex).trim();
  }

  speech = speech.replace(QUOTED_SPAN_PATTERN, "");
  speech = speech.replace(EMOJI_PATTERN, "");

  return speech.trim();
}
