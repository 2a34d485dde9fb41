import type { FunctionalComponent } from "preact";

interface Props {
  busy: boolean;
  host: string;
  status: string;
  onTest: () => void;
}

export const ConnectionPanel: FunctionalComponent<Props> = ({
  busy,
  host,
  status,
  onTest,
}) => (
  <section className="panel connection-panel">
    <h2>Connection</h2>
    <div className="form-row">
      <div className="form-group">
        <span className="board-host">{host || "No board configured"}</span>
        <button
          className="btn btn-secondary"
          disabled={busy}
          onClick={onTest}
          type="button"
        >
          Test Connection
        </button>
      </div>
      <div className="form-group">
        <label htmlFor="connectionStatus">Connection Status:</label>
        <output className="status-box" id="connectionStatus">
          {status}
        </output>
      </div>
    </div>
  </section>
);
