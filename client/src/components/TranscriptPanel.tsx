import { useEffect, useRef } from "react";

import type { TranscriptItem } from "../hooks/useTutorSocket";

type TranscriptPanelProps = {
  turns: TranscriptItem[];
  /** Shown before the first message, so the child knows what Genie expects. */
  emptyHint: string;
};

const speakerByRole: Record<TranscriptItem["role"], string> = {
  user: "You",
  assistant: "Genie",
  system: "Note"
};

export function TranscriptPanel({ turns, emptyHint }: TranscriptPanelProps): JSX.Element {
  const endRef = useRef<HTMLDivElement>(null);
  const replies = turns.filter((turn) => turn.role === "assistant").length;

  useEffect(() => {
    endRef.current?.scrollIntoView({ block: "end", behavior: "smooth" });
  }, [turns.length]);

  return (
    <section className="transcript-panel" aria-label="Conversation with Genie" aria-live="polite">
      <header className="transcript-header">
        <h2>Conversation</h2>
        <span>{replies === 1 ? "1 reply" : `${replies} replies`}</span>
      </header>

      {turns.length === 0 ? <p className="transcript-empty">{emptyHint}</p> : null}

      <ol className="transcript-list">
        {turns.map((turn) => (
          <li key={turn.id} className="chat-bubble" data-role={turn.role} title={turn.createdAt}>
            <span className="chat-speaker">{speakerByRole[turn.role]}</span>
            <p className="chat-text">{turn.text}</p>
            {turn.original ? (
              <p className="chat-original" lang="en">
                In English: {turn.original}
              </p>
            ) : null}
          </li>
        ))}
      </ol>
      <div ref={endRef} />
    </section>
  );
}
