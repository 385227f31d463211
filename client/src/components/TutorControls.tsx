import { useState } from "react";

import { LANGUAGES, SCENARIOS, type ConversationMode, type TutorSettings } from "../tutorOptions";

type TutorControlsProps = {
  settings: TutorSettings;
  disabled: boolean;
  onChange: (settings: TutorSettings) => void;
  onSendText: (text: string) => Promise<void>;
};

export function TutorControls({ settings, disabled, onChange, onSendText }: TutorControlsProps): JSX.Element {
  const [draft, setDraft] = useState("");

  return (
    <section className="tutor-controls">
      <label className="control-field">
        <span>Mode</span>
        <select
          value={settings.mode}
          onChange={(event) => onChange({ ...settings, mode: parseMode(event.target.value) })}
        >
          <option value="freechat">Free chat</option>
          <option value="roleplay">Role play</option>
        </select>
      </label>

      <label className="control-field">
        <span>Scenario</span>
        <select
          value={settings.scenario}
          disabled={settings.mode !== "roleplay"}
          onChange={(event) => onChange({ ...settings, scenario: event.target.value })}
        >
          {SCENARIOS.map((scenario) => (
            <option key={scenario.key} value={scenario.key}>
              {scenario.label}
            </option>
          ))}
        </select>
      </label>

      <label className="control-field">
        <span>Genie speaks</span>
        <select value={settings.language} onChange={(event) => onChange({ ...settings, language: event.target.value })}>
          {LANGUAGES.map((language) => (
            <option key={language.code} value={language.code}>
              {language.label}
            </option>
          ))}
        </select>
      </label>

      <form
        className="text-form"
        onSubmit={(event) => {
          event.preventDefault();
          const text = draft;
          setDraft("");
          void onSendText(text);
        }}
      >
        <input
          type="text"
          value={draft}
          placeholder="Or type a message"
          disabled={disabled}
          onChange={(event) => setDraft(event.target.value)}
        />
        <button type="submit" disabled={disabled || draft.trim().length === 0}>
          Send
        </button>
      </form>
    </section>
  );
}

function parseMode(value: string): ConversationMode {
  return value === "roleplay" ? "roleplay" : "freechat";
}
