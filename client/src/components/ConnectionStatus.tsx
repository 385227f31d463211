import type { TutorState } from "../hooks/useTutorSocket";

type ConnectionStatusProps = {
  state: TutorState;
  error: string | null;
};

const stateLabelMap: Record<TutorState, string> = {
  idle: "Ready",
  connecting: "Connecting",
  recording: "Listening",
  thinking: "Thinking",
  speaking: "Speaking",
  error: "Problem"
};

export function ConnectionStatus({ state, error }: ConnectionStatusProps): JSX.Element {
  return (
    <section className="status-panel" aria-live="polite">
      <div className="status-row">
        <span className="status-dot" data-state={state} />
        <span className="status-title">{stateLabelMap[state]}</span>
      </div>
      <div className="status-meta status-tip">{tipFor(state)}</div>
      {error ? <p className="status-error">{error}</p> : null}
    </section>
  );
}

function tipFor(state: TutorState): string {
  switch (state) {
    case "speaking":
      return "Genie is talking. Hold the button to interrupt.";
    case "thinking":
      return "Genie is thinking about your answer...";
    case "recording":
      return "Let go of the button when you are done.";
    default:
      return "Hold the button and say something to Genie.";
  }
}
