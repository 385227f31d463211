const VOICE_BY_LANGUAGE: Readonly<Record<string, string>> = {
  "en-US": "coral",
  "hi-IN": "sage",
  "mr-IN": "sage",
  "gu-IN": "shimmer",
  "ta-IN": "shimmer",
  "pa-IN": "ballad"
};

export function selectVoice(languageCode: string, defaultVoice: string): string {
  return Object.hasOwn(VOICE_BY_LANGUAGE, languageCode) ? VOICE_BY_LANGUAGE[languageCode] : defaultVoice;
}
