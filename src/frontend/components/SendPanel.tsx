import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import type { FunctionalComponent } from "preact";
import { useMemo } from "preact/hooks";
import { formatMessage } from "../../board/formatter.ts";
import { BoardView } from "./BoardView.tsx";

interface Props {
  busy: boolean;
  disabled: boolean;
  status: string;
  text: string;
  onSend: () => void;
  onTextChange: (text: string) => void;
}

/** Text input with a live preview of how the board will lay it out. */
export const SendPanel: FunctionalComponent<Props> = ({
  busy,
  disabled,
  status,
  text,
  onSend,
  onTextChange,
}) => {
  const preview = useMemo(() => formatMessage(text), [text]);

  return (
    <section className="panel send-panel">
      <h2>Send Message</h2>
      <form
        className="form-row"
        onSubmit={(e) => {
          e.preventDefault();
          onSend();
        }}
      >
        <div className="form-group">
          <label htmlFor="messageInput">Message:</label>
          <input
            disabled={disabled}
            id="messageInput"
            onInput={(e) => onTextChange(e.currentTarget.value)}
            placeholder="Enter your message here..."
            type="text"
            value={text}
          />
        </div>
        <div className="form-group">
          <button
            className="btn btn-primary"
            disabled={disabled || busy}
            type="submit"
          >
            Send to Vestaboard
          </button>
        </div>
      </form>
      {isErr(preview) ? (
        <p className="preview-error">{unwrapErr(preview).message}</p>
      ) : (
        <div className="preview">
          <BoardView grid={unwrapOk(preview).grid} label="Preview" />
          {unwrapOk(preview).truncated && (
            <p className="preview-warning">
              Message is longer than 6 lines; the rest will be cut off.
            </p>
          )}
        </div>
      )}
      <div className="form-group">
        <label htmlFor="sendStatus">Send Status:</label>
        <output className="status-box" id="sendStatus">
          {status}
        </output>
      </div>
    </section>
  );
};
