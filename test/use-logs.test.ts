/** @vitest-environment jsdom */
import { describe, expect, it, vi } from "vitest";
import { useLogs } from "../src/frontend/hooks/useLogs.ts";
import { act, renderHook } from "./vitest-render-hook.ts";

describe("useLogs", () => {
  it("stamps entries with the injected clock", () => {
    const at = new Date("2025-10-10T15:45:00Z");
    const now = vi.fn(() => at);
    const { result } = renderHook(() => useLogs({ now }));

    act(() => result.current.addLog("Sent", "Testing connection"));
    expect(result.current.logs).toEqual([
      {
        message: "Testing connection",
        timestamp: at.toLocaleTimeString(),
        type: "Sent",
      },
    ]);
  });

  it("keeps only the newest entries", () => {
    const { result } = renderHook(() => useLogs({ max: 3 }));
    for (const message of ["a", "b", "c", "d"]) {
      act(() => result.current.addLog("Info", message));
    }
    expect(result.current.logs.map((l) => l.message)).toEqual(["b", "c", "d"]);
  });

  it("clears", () => {
    const { result, unmount } = renderHook(() => useLogs());
    act(() => result.current.addLog("Error", "boom"));
    act(() => result.current.clearLogs());
    expect(result.current.logs).toEqual([]);
    unmount();
  });
});
