import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import { useCallback, useEffect, useMemo, useState } from "preact/hooks";
import { blankGrid } from "../board/grid.ts";
import {
  type ApiClient,
  createApiClient,
  describeUiError,
  type SnapshotData,
  type StatusData,
} from "./api.ts";
import { ActivityLog } from "./components/ActivityLog.tsx";
import { ConnectionPanel } from "./components/ConnectionPanel.tsx";
import { NotConfiguredBanner } from "./components/NotConfiguredBanner.tsx";
import { ReadPanel } from "./components/ReadPanel.tsx";
import { SendPanel } from "./components/SendPanel.tsx";
import { ToolsPanel } from "./components/ToolsPanel.tsx";
import { useLogs } from "./hooks/useLogs.ts";

interface AppProps {
  /** Injected for tests; defaults to the same-origin API. */
  api?: ApiClient;
}

export function App({ api: injected }: AppProps = {}) {
  const api = useMemo(() => injected ?? createApiClient(), [injected]);
  const { logs, addLog, clearLogs } = useLogs();

  const [status, setStatus] = useState<StatusData | null>(null);
  const [busy, setBusy] = useState(false);
  const [text, setText] = useState("");
  const [connectionStatus, setConnectionStatus] = useState("Initializing...");
  const [sendStatus, setSendStatus] = useState("");
  const [readStatus, setReadStatus] = useState("");
  const [snapshot, setSnapshot] = useState<SnapshotData | null>(null);

  const configured = status?.configured ?? false;

  const loadStatus = useCallback(async () => {
    const result = await api.status();
    if (isErr(result)) {
      const message = describeUiError(unwrapErr(result));
      setConnectionStatus(message);
      addLog("Error", message);
      return;
    }
    const data = unwrapOk(result);
    setStatus(data);
    setConnectionStatus(
      data.configured ? `Ready: board at ${data.host}` : "Not configured",
    );
  }, [api, addLog]);

  useEffect(() => {
    void loadStatus();
  }, [loadStatus]);

  // One board call at a time; every button is disabled while it runs.
  const run = async (action: () => Promise<void>) => {
    setBusy(true);
    try {
      await action();
    } finally {
      setBusy(false);
    }
  };

  const handleTest = () =>
    run(async () => {
      addLog("Sent", "Testing connection");
      const result = await api.test();
      if (isErr(result)) {
        const message = describeUiError(unwrapErr(result));
        setConnectionStatus(message);
        addLog("Error", message);
        return;
      }
      const { message } = unwrapOk(result);
      setConnectionStatus(message);
      addLog("Received", message);
    });

  const handleSend = () => {
    if (text.trim() === "") {
      setSendStatus("Error: Please enter a message");
      return;
    }
    return run(async () => {
      addLog("Sent", `Message: ${text}`);
      const result = await api.sendText(text);
      if (isErr(result)) {
        const message = describeUiError(unwrapErr(result));
        setSendStatus(message);
        addLog("Error", message);
        return;
      }
      const sent = unwrapOk(result);
      const summary = sent.truncated
        ? `${sent.message} (truncated to 6 lines)`
        : sent.message;
      setSendStatus(summary);
      addLog("Received", summary);
    });
  };

  const handleRead = () =>
    run(async () => {
      addLog("Sent", "Reading board");
      const result = await api.read();
      if (isErr(result)) {
        const message = describeUiError(unwrapErr(result));
        setReadStatus(message);
        addLog("Error", message);
        return;
      }
      const data = unwrapOk(result);
      setSnapshot(data);
      setReadStatus(
        data.text === ""
          ? "Board is empty"
          : `Current board content:\n${data.text}`,
      );
      addLog("Received", "Board content read");
    });

  const handleMetals = () =>
    run(async () => {
      addLog("Sent", "Fetching metals prices");
      const result = await api.metals();
      if (isErr(result)) {
        const message = describeUiError(unwrapErr(result));
        setSendStatus(message);
        addLog("Error", message);
        return;
      }
      const { message } = unwrapOk(result);
      setSendStatus(message);
      addLog("Received", message);
    });

  const handleClear = () =>
    run(async () => {
      addLog("Sent", "Clearing board");
      const result = await api.sendRaw(blankGrid());
      if (isErr(result)) {
        const message = describeUiError(unwrapErr(result));
        setSendStatus(message);
        addLog("Error", message);
        return;
      }
      setSendStatus("Board cleared");
      addLog("Received", "Board cleared");
    });

  return (
    <div className="container">
      <header className="header">
        <h1>Vestaboard Message Controller</h1>
        <p>Send and read messages from your Vestaboard device</p>
        <div className="connection-status">
          <span
            className={configured ? "status-connected" : "status-disconnected"}
          >
            {configured ? "Configured" : "Not Configured"}
          </span>
        </div>
      </header>
      {status && !status.configured && (
        <NotConfiguredBanner onRecheck={() => void loadStatus()} />
      )}
      <main className="main-content">
        <ConnectionPanel
          busy={busy}
          host={status?.host ?? ""}
          onTest={handleTest}
          status={connectionStatus}
        />
        <SendPanel
          busy={busy}
          disabled={!configured}
          onSend={handleSend}
          onTextChange={setText}
          status={sendStatus}
          text={text}
        />
        <ReadPanel
          busy={busy}
          disabled={!configured}
          onRead={handleRead}
          snapshot={snapshot}
          status={readStatus}
        />
        <ToolsPanel
          busy={busy}
          disabled={!configured}
          onClear={handleClear}
          onMetals={handleMetals}
        />
        <section className="panel tips-panel">
          <h2>Quick Tips</h2>
          <ul>
            <li>The board shows up to 6 rows of 22 characters each</li>
            <li>
              Text is uppercased, word-wrapped and centered; anything past
              the sixth line is cut off
            </li>
            <li>
              Use <code>{"{63}"}</code> to <code>{"{71}"}</code> for colour
              tiles
            </li>
            <li>Use "Test Connection" to check the board is reachable</li>
          </ul>
        </section>
        <ActivityLog logs={logs} onClear={clearLogs} />
      </main>
    </div>
  );
}
