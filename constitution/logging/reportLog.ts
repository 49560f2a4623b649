/**
 * Structured logging for chart and report events.
 *
 * One JSON object per line, on stdout unless redirected. Birth names are never logged; a
 * request is identified by its request_id.
 */

import type { ReportKind } from "../report/reportTargets.js";

export type ReportLogEvent =
  | "chart.computed"
  | "report.generate.started"
  | "report.generate.succeeded"
  | "report.generate.failed"
  | "report.length_rejected"
  | "report.fallback.rendered";

export type ReportLogData = {
  event: ReportLogEvent;
  request_id?: string;
  report_kind?: ReportKind;
  archetype_id?: string;
  engine?: string;
  character_count?: number;
  target_length?: number;
  duration_ms?: number;
  error_code?: string;
  error_message?: string;
  [key: string]: unknown;
};

export type ReportLogWriter = (line: string) => void;

let writeLine: ReportLogWriter = (line) => console.log(line);

/**
 * Redirect log lines (the CLI sends them to stderr so stdout carries only the
 * report). Returns the previous writer.
 */
export function setReportLogWriter(writer: ReportLogWriter): ReportLogWriter {
  const previous = writeLine;
  writeLine = writer;
  return previous;
}

export function reportLog(data: ReportLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };
  writeLine(JSON.stringify(logEntry));
}

export const reportLogHelpers = {
  chartComputed(params: { request_id: string; archetype_id: string; engine: string }): void {
    reportLog({ event: "chart.computed", ...params });
  },

  generateStarted(params: {
    request_id: string;
    report_kind: ReportKind;
    target_length: number;
  }): void {
    reportLog({ event: "report.generate.started", ...params });
  },

  generateSucceeded(params: {
    request_id: string;
    report_kind: ReportKind;
    character_count: number;
    duration_ms: number;
  }): void {
    reportLog({ event: "report.generate.succeeded", ...params });
  },

  generateFailed(params: {
    request_id: string;
    report_kind: ReportKind;
    error_code: string;
    error_message: string;
    duration_ms: number;
  }): void {
    reportLog({ event: "report.generate.failed", ...params });
  },

  lengthRejected(params: {
    request_id: string;
    report_kind: ReportKind;
    character_count: number;
    min: number;
    max: number;
  }): void {
    reportLog({ event: "report.length_rejected", ...params });
  },

  fallbackRendered(params: {
    request_id: string;
    report_kind: ReportKind;
    reason: string;
    character_count: number;
  }): void {
    reportLog({ event: "report.fallback.rendered", ...params });
  },
};
