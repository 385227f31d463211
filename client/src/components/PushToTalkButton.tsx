import type { KeyboardEvent, PointerEvent } from "react";

import type { TutorState } from "../hooks/useTutorSocket";

type PushToTalkButtonProps = {
  state: TutorState;
  /** What Genie is doing with the next answer, e.g. "Role play: At school". */
  cue: string;
  onPressStart: () => Promise<void> | void;
  onPressEnd: () => Promise<void> | void;
};

const labelByState: Record<TutorState, string> = {
  idle: "Hold to talk",
  connecting: "Connecting...",
  recording: "Release to send",
  thinking: "Genie is thinking...",
  speaking: "Hold to interrupt",
  error: "Hold to try again"
};

const TALK_KEY = " ";

export function PushToTalkButton({ state, cue, onPressStart, onPressEnd }: PushToTalkButtonProps): JSX.Element {
  const holdPointer = (event: PointerEvent<HTMLButtonElement>) => {
    event.preventDefault();
    event.currentTarget.setPointerCapture(event.pointerId);
    void onPressStart();
  };

  const releasePointer = (event: PointerEvent<HTMLButtonElement>) => {
    event.preventDefault();
    if (event.currentTarget.hasPointerCapture(event.pointerId)) {
      event.currentTarget.releasePointerCapture(event.pointerId);
    }
    void onPressEnd();
  };

  const onKey = (event: KeyboardEvent<HTMLButtonElement>, pressed: boolean) => {
    if (event.key !== TALK_KEY || (pressed && event.repeat)) {
      return;
    }
    event.preventDefault();
    void (pressed ? onPressStart() : onPressEnd());
  };

  return (
    <div className="ptt-wrapper">
      <button
        type="button"
        className="ptt-button"
        data-state={state}
        aria-pressed={state === "recording"}
        aria-label={`${labelByState[state]}. ${cue}`}
        onPointerDown={holdPointer}
        onPointerUp={releasePointer}
        onPointerCancel={() => void onPressEnd()}
        onKeyDown={(event) => onKey(event, true)}
        onKeyUp={(event) => onKey(event, false)}
      >
        <span className="ptt-core" />
        <span className="ptt-label">{labelByState[state]}</span>
      </button>
      <p className="ptt-cue">{cue}</p>
    </div>
  );
}
