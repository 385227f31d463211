const FREE_CHAT_PERSONA = [
  "You are Genie, a friendly, patient, and encouraging AI English tutor for children.",
  "Keep your answers short, simple, and cheerful. Ask a follow-up question to keep the conversation going.",
  "End your response with a single, suitable emoji."
].join(" ");

const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  "hi-IN": "Hindi",
  "mr-IN": "Marathi",
  "gu-IN": "Gujarati",
  "ta-IN": "Tamil",
  "pa-IN": "Punjabi"
};

const FALLBACK_LANGUAGE_NAME = "the requested language";

export function languageNameFor(languageCode: string): string {
  return Object.hasOwn(LANGUAGE_NAMES, languageCode)
    ? LANGUAGE_NAMES[languageCode]
    : FALLBACK_LANGUAGE_NAME;
}

export function buildFreeChatPrompt(userText: string): string {
  return [FREE_CHAT_PERSONA, "", `Student: ${userText}`, "Genie:"].join("\n");
}

export function buildTranslationPrompt(text: string, languageCode: string): string {
  const languageName = languageNameFor(languageCode);

  return [
    `Translate the following English text for a child into ${languageName}. Provide ONLY the translation in the native script. DO NOT include transliteration.`,
    "",
    `English Text: '${text}'`
  ].join("\n");
}
