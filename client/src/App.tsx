import { useState } from "react";

import { ConnectionStatus } from "./components/ConnectionStatus";
import { PushToTalkButton } from "./components/PushToTalkButton";
import { TranscriptPanel } from "./components/TranscriptPanel";
import { TutorControls } from "./components/TutorControls";
import { useTutorSocket } from "./hooks/useTutorSocket";
import { DEFAULT_SETTINGS, describeSettings, emptyHintFor, type TutorSettings } from "./tutorOptions";

export function App(): JSX.Element {
  const [settings, setSettings] = useState<TutorSettings>(DEFAULT_SETTINGS);
  const tutor = useTutorSocket(settings);
  const busy = tutor.state === "connecting" || tutor.state === "thinking";

  return (
    <main className="app-shell">
      <header className="hero">
        <div>
          <p className="eyebrow">English practice</p>
          <h1>Talk with Genie</h1>
        </div>
        <button
          className="reset-button"
          type="button"
          onClick={() => {
            void tutor.resetSession();
          }}
        >
          Start over
        </button>
      </header>

      <section className="layout-grid">
        <aside className="left-rail">
          <ConnectionStatus state={tutor.state} error={tutor.error} />

          <PushToTalkButton
            state={tutor.state}
            cue={describeSettings(settings)}
            onPressStart={tutor.beginPress}
            onPressEnd={tutor.endPress}
          />

          <TutorControls settings={settings} disabled={busy} onChange={setSettings} onSendText={tutor.sendText} />

          <p className="helper-text">Hold the button or the space bar to talk. Holding it while Genie talks stops the reply.</p>
        </aside>

        <TranscriptPanel turns={tutor.turns} emptyHint={emptyHintFor(settings)} />
      </section>
    </main>
  );
}
