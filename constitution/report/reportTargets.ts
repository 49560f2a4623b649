export type ReportKind = "short" | "detailed";
export type ReportTemplateId = "short_report" | "detailed_report";

export type ReportTarget = {
  template_id: ReportTemplateId;
  target_length: number; // characters
  max_tokens: number;
};

export const REPORT_TARGETS: Readonly<Record<ReportKind, ReportTarget>> = {
  short: { template_id: "short_report", target_length: 1_000, max_tokens: 2_000 },
  detailed: { template_id: "detailed_report", target_length: 12_000, max_tokens: 16_000 },
};

export const DISCLAIMER =
  "本結果はエンターテインメント目的の体質傾向分析です。医療診断や治療の代替ではありません。";
