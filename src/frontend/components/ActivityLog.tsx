import type { FunctionalComponent } from "preact";
import type { LogEntry } from "../hooks/useLogs.ts";

interface Props {
  logs: LogEntry[];
  onClear: () => void;
}

function entryClass(type: LogEntry["type"]): string {
  switch (type) {
    case "Error":
      return "log-entry log-error";
    case "Sent":
      return "log-entry log-sent";
    case "Received":
      return "log-entry log-received";
    default:
      return "log-entry log-info";
  }
}

export const ActivityLog: FunctionalComponent<Props> = ({ logs, onClear }) => (
  <section className="panel log-panel">
    <h2>Activity</h2>
    <button className="btn btn-secondary" onClick={onClear} type="button">
      Clear Log
    </button>
    <div className="log-display">
      {logs.length === 0 && <p className="log-empty">No activity yet</p>}
      {logs.map((log, i) => (
        <div className={entryClass(log.type)} key={`log-${log.timestamp}-${i}`}>
          <span className="log-timestamp">{log.timestamp}</span>
          <span className="log-direction">[{log.type}]</span>
          <span className="log-data">{log.message}</span>
        </div>
      ))}
    </div>
  </section>
);
