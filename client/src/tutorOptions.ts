export type ConversationMode = "roleplay" | "freechat";

export type TutorSettings = {
  mode: ConversationMode;
  scenario: string;
  language: string;
};

export const SCENARIOS = [
  { key: "school", label: "At school" },
  { key: "store", label: "At the store" },
  { key: "home", label: "At home" }
] as const;

export const LANGUAGES = [
  { code: "en-US", label: "English" },
  { code: "hi-IN", label: "हिन्दी (Hindi)" },
  { code: "mr-IN", label: "मराठी (Marathi)" },
  { code: "gu-IN", label: "ગુજરાતી (Gujarati)" },
  { code: "ta-IN", label: "தமிழ் (Tamil)" },
  { code: "pa-IN", label: "ਪੰਜਾਬੀ (Punjabi)" }
] as const;

export const DEFAULT_SETTINGS: TutorSettings = {
  mode: "freechat",
  scenario: "school",
  language: "en-US"
};

function scenarioLabel(key: string): string {
  return SCENARIOS.find((scenario) => scenario.key === key)?.label ?? key;
}

function languageLabel(code: string): string {
  return LANGUAGES.find((language) => language.code === code)?.label ?? code;
}

/** One-line summary of the current settings, shown under the talk button. */
export function describeSettings(settings: TutorSettings): string {
  const mode = settings.mode === "roleplay" ? `Role play: ${scenarioLabel(settings.scenario)}` : "Free chat";
  return `${mode}, Genie answers in ${languageLabel(settings.language)}`;
}

export function emptyHintFor(settings: TutorSettings): string {
  if (settings.mode === "roleplay") {
    return `Hold the button and say hello. Genie will play along ${scenarioLabel(settings.scenario).toLowerCase()}.`;
  }

  return "Hold the button and tell Genie about your day!";
}
