#!/usr/bin/env node
import "dotenv/config";

import { loadConfig } from "./constitution/config/loadConfig.js";
import { setReportLogWriter } from "./constitution/logging/reportLog.js";
import {
  EphemerisUnavailableError,
  InvalidInputError,
  UnsupportedRegionError,
} from "./constitution/errors.js";
import { formatPercent, formatPlacement, BODY_LABELS, ELEMENT_LABELS } from "./constitution/report/labels.js";
import { ELEMENTS } from "./constitution/classification/elements.js";
import {
  computeChart,
  createPipelineDeps,
  generateDetailedReport,
  generateShortReport,
  type ChartResult,
} from "./constitution/pipeline/runConstitutionPipeline.js";

type ReportArgs = {
  name?: string;
  date?: string;
  time?: string;
  region?: string;
  kind: "chart" | "short" | "detailed";
  offline: boolean;
};

const USAGE =
  "Usage: run-report --name <name> --date YYYY-MM-DD --time HH:MM --region <prefecture> " +
  "[--kind chart|short|detailed] [--offline]";

export function parseArgs(argv: string[]): ReportArgs {
  const args: ReportArgs = { kind: "short", offline: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];
    if (arg === "--offline") {
      args.offline = true;
      continue;
    }
    if (value === undefined) {
      throw new InvalidInputError([`${arg}: missing value`]);
    }
    switch (arg) {
      case "--name":
        args.name = value;
        break;
      case "--date":
        args.date = value;
        break;
      case "--time":
        args.time = value;
        break;
      case "--region":
        args.region = value;
        break;
      case "--kind":
        if (value !== "chart" && value !== "short" && value !== "detailed") {
          throw new InvalidInputError([`--kind: expected chart, short or detailed (got ${value})`]);
        }
        args.kind = value;
        break;
      default:
        throw new InvalidInputError([`unknown argument ${arg}`]);
    }
    i++;
  }
  return args;
}

/**
 * Turn CLI strings into the raw birth record. Shape problems are left to the
 * input schema so the CLI reports the same issues as any other caller.
 */
export function toBirthRecord(args: ReportArgs): Record<string, string | undefined> {
  const [year, month, day] = (args.date ?? "").split("-");
  const [hour, minute] = (args.time ?? "").split(":");
  return { name: args.name, year, month, day, hour, minute, region: args.region };
}

function renderChart(chart: ChartResult): string {
  const { facts } = chart;
  const lines = [
    `${facts.birth.name}（${facts.birth_local}、${facts.geo.region_name}）`,
    `UTC: ${facts.instant_utc}`,
    `16元型: ${facts.archetype.display_name}`,
    "",
    ...facts.positions.map((p) => `${BODY_LABELS[p.body]}: ${formatPlacement(p.sign, p.degree_in_sign)}`),
    "",
    ELEMENTS.map((e) => `${ELEMENT_LABELS[e]} ${formatPercent(facts.element_percentages[e])}`).join(" ／ "),
    "",
    `※${chart.disclaimer}`,
  ];
  return lines.join("\n");
}

async function main(): Promise<void> {
  setReportLogWriter((line) => process.stderr.write(`${line}\n`));
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const deps = createPipelineDeps(config, { offline: args.offline });
  const raw = toBirthRecord(args);

  if (args.kind === "chart") {
    process.stdout.write(`${renderChart(computeChart(raw, deps))}\n`);
    return;
  }

  const result =
    args.kind === "short"
      ? await generateShortReport(raw, deps)
      : await generateDetailedReport(raw, deps);
  process.stdout.write(`${result.report.text}\n`);
}

function isRecoverable(err: unknown): boolean {
  return (
    err instanceof InvalidInputError ||
    err instanceof UnsupportedRegionError ||
    err instanceof EphemerisUnavailableError
  );
}

if (process.argv[1]) {
  const invokedPath = (() => {
    try {
      return new URL(`file://${process.argv[1]}`).href;
    } catch {
      return undefined;
    }
  })();
  if (invokedPath && invokedPath === import.meta.url) {
    main().catch((err: unknown) => {
      if (isRecoverable(err)) {
        console.error(err instanceof Error ? err.message : String(err));
        if (err instanceof InvalidInputError) console.error(USAGE);
        process.exit(2);
      }
      console.error(err);
      process.exit(1);
    });
  }
}
