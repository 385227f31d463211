import type { FastifyBaseLogger } from "fastify";

import type { Generator } from "./capabilities.js";
import { buildTranslationPrompt } from "./prompts.js";

/**
 * Translates an English reply for the child. English targets and a disabled generator pass
 * the text through; a failed translation falls back to the English text.
 */
export async function translateText(
  text: string,
  languageCode: string,
  generator: Generator,
  log?: FastifyBaseLogger
): Promise<string> {
  if (languageCode.startsWith("en") || !generator.available) {
    return text;
  }

  try {
    const translated = (await generator.complete(buildTranslationPrompt(text, languageCode))).trim();
    return translated || text;
  } catch (error) {
    log?.warn({ err: error, languageCode }, "Translation failed, using English text");
    return text;
  }
}
