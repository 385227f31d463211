import { readFileSync } from "node:fs";

import { z } from "zod";

const speechCredentialSchema = z.object({
  apiKey: z.string().min(1, "apiKey is required"),
  baseUrl: z.string().url("baseUrl must be a valid URL").optional()
});

export type SpeechCredential = z.infer<typeof speechCredentialSchema>;

/**
 * Resolves the speech credential from either an inline JSON blob or a path to a JSON file.
 */
export function parseSpeechCredential(raw: string): SpeechCredential {
  const trimmed = raw.trim();
  const source = trimmed.startsWith("{") ? trimmed : readFileSync(trimmed, "utf8");

  let data: unknown;
  try {
    data = JSON.parse(source) as unknown;
  } catch (error) {
    throw new Error(
      `Speech credential is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = speechCredentialSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid speech credential: ${parsed.error.message}`);
  }

  return parsed.data;
}
