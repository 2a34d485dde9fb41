import type { FunctionalComponent } from "preact";
import type { SnapshotData } from "../api.ts";
import { BoardView } from "./BoardView.tsx";

interface Props {
  busy: boolean;
  disabled: boolean;
  snapshot: SnapshotData | null;
  status: string;
  onRead: () => void;
}

export const ReadPanel: FunctionalComponent<Props> = ({
  busy,
  disabled,
  snapshot,
  status,
  onRead,
}) => (
  <section className="panel read-panel">
    <h2>Read Current Message</h2>
    <div className="form-group">
      <button
        className="btn btn-secondary"
        disabled={disabled || busy}
        onClick={onRead}
        type="button"
      >
        Read from Vestaboard
      </button>
    </div>
    {snapshot && <BoardView grid={snapshot.grid} label="Current board" />}
    <div className="form-group">
      <label htmlFor="readStatus">Current Board Content:</label>
      <pre className="status-box" id="readStatus">
        {status}
      </pre>
    </div>
  </section>
);
