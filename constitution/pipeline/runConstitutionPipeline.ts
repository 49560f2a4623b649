import { randomUUID } from "node:crypto";

import { computeNatalPositions } from "../../astro/computeNatalPositions.js";
import {
  assertSupportedCivilYear,
  type EphemerisProvider,
} from "../../astro/ephemeris/ephemerisProvider.js";
import { createSwissEphemeris } from "../../astro/ephemeris/swisseph.js";
import { localToUtc } from "../../astro/localTime.js";
import { resolveArchetypeForPositions } from "../archetypes/archetypeTable.js";
import { computeElementBalance } from "../classification/elements.js";
import { getWeightingPolicy, type WeightingPolicy } from "../classification/weightingPolicy.js";
import type { ConstitutionConfig } from "../config/loadConfig.js";
import { parseBirthInput } from "../input/birthInput.schema.js";
import { reportLogHelpers } from "../logging/reportLog.js";
import { resolveRegion } from "../regions/regionTable.js";
import { assembleReport, type AssembledReport } from "../report/assembleReport.js";
import { createOpenAITextGenerator } from "../report/openAITextGenerator.js";
import { buildReportFacts, type ReportFacts } from "../report/reportFacts.js";
import type { ReportKind } from "../report/reportTargets.js";
import { createUnavailableTextGenerator, type TextGenerator } from "../report/textGenerator.js";

export type PipelineDeps = {
  ephemeris: EphemerisProvider;
  generator: TextGenerator;
  weighting: WeightingPolicy;
  timeout_ms: number;
  length_tolerance: number;
  /** Overrides the random request id; used by tests. */
  request_id?: string;
};

export type ChartResult = {
  request_id: string;
  facts: ReportFacts;
  disclaimer: string;
};

export type ReportResult = ChartResult & {
  report: AssembledReport;
};

/**
 * Wire the production collaborators from configuration. With `offline` the
 * generator always fails and every report comes from the deterministic renderer.
 */
export function createPipelineDeps(
  config: ConstitutionConfig,
  options: { offline?: boolean } = {}
): PipelineDeps {
  return {
    ephemeris: createSwissEphemeris({ ephePath: config.swisseph_path }),
    generator: options.offline
      ? createUnavailableTextGenerator("offline mode")
      : createOpenAITextGenerator({
          api_key: config.openai_api_key,
          model: config.llm_model,
          timeout_ms: config.llm_timeout_ms,
        }),
    weighting: getWeightingPolicy(config.element_weighting),
    timeout_ms: config.llm_timeout_ms,
    length_tolerance: config.length_tolerance,
  };
}

/**
 * validate → region → year range → UTC → positions → elements → archetype.
 * Input, region and year-range errors are raised before the ephemeris is touched.
 */
function computeFacts(raw: unknown, deps: PipelineDeps): ReportFacts {
  const birth = parseBirthInput(raw);
  const geo = resolveRegion(birth.region, birth);
  assertSupportedCivilYear(birth.year);
  const instant_utc = localToUtc(birth, geo.utc_offset_minutes);

  const positions = computeNatalPositions(
    { instant_utc, latitude: geo.latitude, longitude: geo.longitude },
    deps.ephemeris
  );
  const element_balance = computeElementBalance(positions, deps.weighting);
  const archetype = resolveArchetypeForPositions(positions);

  return buildReportFacts({ birth, geo, instant_utc, positions, element_balance, archetype });
}

export function computeChart(raw: unknown, deps: PipelineDeps): ChartResult {
  const request_id = deps.request_id ?? randomUUID();
  const facts = computeFacts(raw, deps);
  reportLogHelpers.chartComputed({
    request_id,
    archetype_id: facts.archetype.id,
    engine: deps.ephemeris.engine,
  });
  return { request_id, facts, disclaimer: facts.disclaimer };
}

async function generateReport(
  kind: ReportKind,
  raw: unknown,
  deps: PipelineDeps
): Promise<ReportResult> {
  const chart = computeChart(raw, deps);
  const report = await assembleReport(kind, chart.facts, {
    generator: deps.generator,
    timeout_ms: deps.timeout_ms,
    length_tolerance: deps.length_tolerance,
    request_id: chart.request_id,
  });
  return { ...chart, report };
}

export function generateShortReport(raw: unknown, deps: PipelineDeps): Promise<ReportResult> {
  return generateReport("short", raw, deps);
}

export function generateDetailedReport(raw: unknown, deps: PipelineDeps): Promise<ReportResult> {
  return generateReport("detailed", raw, deps);
}
