import { afterEach, describe, expect, it, vi } from "vitest";
import { reportLogHelpers, setReportLogWriter } from "../reportLog.js";

describe("reportLog", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON line per event with a timestamp", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});

    reportLogHelpers.lengthRejected({
      request_id: "req-1",
      report_kind: "short",
      character_count: 500,
      min: 800,
      max: 1_200,
    });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      event: "report.length_rejected",
      request_id: "req-1",
      report_kind: "short",
      character_count: 500,
      min: 800,
      max: 1_200,
    });
    expect(entry).toHaveProperty("timestamp");
  });

  it("sends lines to a replacement writer and hands back the previous one", () => {
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    const lines: string[] = [];
    const previous = setReportLogWriter((line) => lines.push(line));

    try {
      reportLogHelpers.chartComputed({ request_id: "req-2", archetype_id: "garden", engine: "table" });
    } finally {
      setReportLogWriter(previous);
    }

    expect(stdout).not.toHaveBeenCalled();
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      event: "chart.computed",
      request_id: "req-2",
      archetype_id: "garden",
      engine: "table",
    });

    reportLogHelpers.chartComputed({ request_id: "req-3", archetype_id: "garden", engine: "table" });
    expect(stdout).toHaveBeenCalledTimes(1);
  });
});
