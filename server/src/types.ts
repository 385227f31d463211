export type ConversationMode = "roleplay" | "freechat";

export type TurnRole = "user" | "model";

export type Turn = {
  role: TurnRole;
  text: string;
};

export type ConnectionSession = {
  scenario: string;
  turns: Turn[];
};

export type TurnRequest = {
  connectionId: string;
  userText: string;
  mode: ConversationMode;
  scenario?: string;
  languageCode: string;
};

export type TurnResult = {
  audio: Buffer;
  translatedText: string;
  originalEnglishText: string;
};

export type ServerMessage =
  | { type: "transcription"; text: string }
  | {
      type: "audio_response";
      audio_data: string;
      translated_text: string;
      original_english: string;
    }
  | { type: "backend_message"; message: string; error: string };
