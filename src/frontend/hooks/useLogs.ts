import { useCallback, useState } from "preact/hooks";

export type LogLevel = "Info" | "Sent" | "Received" | "Error";

export interface LogEntry {
  timestamp: string;
  type: LogLevel;
  message: string;
}

export interface UseLogsOptions {
  now?: () => Date; // DI for testing
  max?: number; // default 100
}

export interface UseLogsResult {
  logs: LogEntry[];
  addLog: (type: LogLevel, message: string) => void;
  clearLogs: () => void;
}

// Module-level so addLog keeps its identity across renders.
const systemClock = () => new Date();

export function useLogs(opts: UseLogsOptions = {}): UseLogsResult {
  const { now = systemClock, max = 100 } = opts;
  const [logs, setLogs] = useState<LogEntry[]>([]);

  const addLog = useCallback(
    (type: LogLevel, message: string) => {
      const time = now().toLocaleTimeString();
      setLogs((prev) => [
        ...prev.slice(-(max - 1)),
        { message, timestamp: time, type },
      ]);
    },
    [now, max],
  );

  const clearLogs = useCallback(() => setLogs([]), []);

  return { addLog, clearLogs, logs };
}
