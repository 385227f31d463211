import type OpenAI from "openai";
import { z } from "zod";

import type { Turn } from "../types.js";
import { ContentSafetyError, type Generator } from "./capabilities.js";

type InputMessage = {
  role: "user" | "assistant";
  content: string;
};

const messageItemSchema = z.object({
  type: z.literal("message"),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
      refusal: z.string().optional()
    })
  )
});

const responseSchema = z.object({
  output_text: z.string().optional(),
  output: z.array(z.unknown()).optional(),
  incomplete_details: z
    .object({
      reason: z.string().optional()
    })
    .nullish()
});

export type ResponseOutput = {
  text: string;
  refusal: string | null;
};

export function createOpenAiGenerator(client: OpenAI, model: string): Generator {
  const generate = async (input: string | InputMessage[]): Promise<string> => {
    const response = await client.responses.create({
      model,
      input,
      max_output_tokens: 420,
      temperature: 0.7
    });

    const output = readResponseOutput(response);
    if (output.refusal !== null) {
      throw new ContentSafetyError(output.refusal || undefined);
    }

    if (!output.text) {
      throw new Error("LLM returned empty content");
    }

    return output.text;
  };

  return {
    available: true,
    complete: (prompt) => generate(prompt),
    chat: (history, message) => generate([...history.map(toInputMessage), { role: "user", content: message }])
  };
}

function toInputMessage(turn: Turn): InputMessage {
  return {
    role: turn.role === "model" ? "assistant" : "user",
    content: turn.text
  };
}

/**
 * Collects the assistant text of a Responses API result. A refusal part, or a response
 * cut short by the content filter, is reported through `refusal`.
 */
export function readResponseOutput(response: unknown): ResponseOutput {
  const parsed = responseSchema.safeParse(response);
  if (!parsed.success) {
    return { text: "", refusal: null };
  }

  const chunks: string[] = [];
  let refusal: string | null = null;

  for (const item of parsed.data.output ?? []) {
    const message = messageItemSchema.safeParse(item);
    if (!message.success) {
      continue;
    }

    for (const content of message.data.content) {
      if (content.type === "output_text" && typeof content.text === "string") {
        chunks.push(content.text);
      }

      if (content.type === "refusal") {
        refusal = content.refusal ?? "";
      }
    }
  }

  if (refusal === null && parsed.data.incomplete_details?.reason === "content_filter") {
    refusal = "";
  }

  const outputText = parsed.data.output_text?.trim();
  const text = outputText ? outputText : chunks.join("\n").trim();

  return { text, refusal };
}
