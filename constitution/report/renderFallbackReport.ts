/**
 * Deterministic report renderer.
 *
 * Used whenever generated prose is unavailable. Built only from ReportFacts
 * and static fragments: identical facts always give identical text. Both
 * renderings name the archetype and list every element percentage.
 */

import { ELEMENTS, elementForSign, type Element } from "../classification/elements.js";
import { DETAILED_SECTIONS } from "./buildReportPrompt.js";
import {
  BODY_THEMES,
  CLOSING,
  ELEMENT_FRAGMENTS,
  PROLOGUE,
  SIGN_KEYWORDS,
} from "./fallbackFragments.js";
import {
  BODY_LABELS,
  ELEMENT_LABELS,
  SIGN_LABELS,
  formatPercent,
  formatPlacement,
} from "./labels.js";
import { positionOf, type ReportFacts } from "./reportFacts.js";
import type { ReportKind } from "./reportTargets.js";

function balanceLine(facts: ReportFacts): string {
  return ELEMENTS.map(
    (e) => `${ELEMENT_LABELS[e]} ${formatPercent(facts.element_percentages[e])}`
  ).join(" ／ ");
}

function presentDominants(facts: ReportFacts): Element[] {
  return facts.dominant_elements.filter((e) => facts.element_balance.weights[e] > 0);
}

function dominanceSentence(facts: ReportFacts): string {
  const [top, second] = presentDominants(facts);
  const topText = `${ELEMENT_LABELS[top]}（${formatPercent(facts.element_percentages[top])}）`;
  if (!second) {
    return `すべての天体が${topText}のエレメントに集まっています。`;
  }
  return `最も強いエレメントは${topText}、次いで${ELEMENT_LABELS[second]}（${formatPercent(
    facts.element_percentages[second]
  )}）です。`;
}

function lackingSentence(facts: ReportFacts): string | null {
  if (!facts.lacking_elements.length) return null;
  const labels = facts.lacking_elements.map((e) => ELEMENT_LABELS[e]).join("・");
  const first = facts.lacking_elements[0];
  return `${labels}のエレメントには天体がありません。${ELEMENT_FRAGMENTS[first].lacking}`;
}

function luminariesSentence(facts: ReportFacts): string {
  const sun = positionOf(facts, "sun");
  const moon = positionOf(facts, "moon");
  const { archetype } = facts;
  return (
    `太陽は${formatPlacement(sun.sign, sun.degree_in_sign)}（${ELEMENT_LABELS[archetype.sun_element]}のエレメント）、` +
    `月は${formatPlacement(moon.sign, moon.degree_in_sign)}（${ELEMENT_LABELS[archetype.moon_element]}のエレメント）にあり、` +
    "この組み合わせがあなたの元型を形づくっています。"
  );
}

export function renderShortFallback(facts: ReportFacts): string {
  const { archetype } = facts;
  const [top] = presentDominants(facts);
  const lines = [
    `${facts.birth.name}さんの体質傾向レポート（簡易版）`,
    "",
    `あなたの16元型は「${archetype.display_name}」です。${archetype.short_description}`,
    luminariesSentence(facts),
    "",
    `エレメントバランス：${balanceLine(facts)}`,
    `${dominanceSentence(facts)}${ELEMENT_FRAGMENTS[top].dominant}`,
    lackingSentence(facts),
    "",
    `キーワード：${archetype.tendency_tags.join("、")}`,
    `体質面では、${archetype.constitution.energy}を持ち、${archetype.constitution.rhythm}が見られる傾向があります。` +
      `日々のケアとしては、${archetype.constitution.care_focus}がおすすめです。`,
    "",
    `※${facts.disclaimer}`,
  ];
  return lines.filter((line): line is string => line !== null).join("\n");
}

function bodySection(facts: ReportFacts): string[] {
  return facts.positions.flatMap((p) => {
    const element = elementForSign(p.sign);
    return [
      `### ${BODY_LABELS[p.body]}：${formatPlacement(p.sign, p.degree_in_sign)}（${ELEMENT_LABELS[element]}）`,
      `${BODY_THEMES[p.body]}${BODY_LABELS[p.body]}が${SIGN_LABELS[p.sign]}にあるあなたは、` +
        `${SIGN_KEYWORDS[p.sign]}をこの領域で発揮しやすい傾向があります。${ELEMENT_FRAGMENTS[element].present}`,
      "",
    ];
  });
}

function elementSection(facts: ReportFacts): string[] {
  const [top] = presentDominants(facts);
  return ELEMENTS.map((e) => {
    const pct = formatPercent(facts.element_percentages[e]);
    const fragments = ELEMENT_FRAGMENTS[e];
    const text =
      e === top
        ? fragments.dominant
        : facts.lacking_elements.includes(e)
          ? fragments.lacking
          : fragments.present;
    return `- ${ELEMENT_LABELS[e]} ${pct}：${text}`;
  });
}

export function renderDetailedFallback(facts: ReportFacts): string {
  const { archetype } = facts;
  const [top] = presentDominants(facts);
  const title = (key: (typeof DETAILED_SECTIONS)[number]["key"]): string => {
    const section = DETAILED_SECTIONS.find((s) => s.key === key);
    return section ? section.title : key;
  };

  const lines = [
    `# ${facts.birth.name}様へ捧ぐ 占星医学体質鑑定書`,
    "",
    `出生：${facts.birth_local}（${facts.geo.region_name}）`,
    "",
    `## ${title("prologue")}`,
    "",
    `${facts.birth.name}様、${PROLOGUE}`,
    "",
    `## ${title("core_pattern")}「${archetype.display_name}」`,
    "",
    `あなたの16元型は「${archetype.display_name}」です。${archetype.short_description}`,
    luminariesSentence(facts),
    "",
    archetype.narrative,
    "",
    `この元型を表すキーワードは「${archetype.tendency_tags.join("」「")}」です。`,
    "",
    `## ${title("soul_council")}`,
    "",
    ...bodySection(facts),
    `## ${title("constitution")}`,
    "",
    `エレメントバランス：${balanceLine(facts)}`,
    dominanceSentence(facts),
    "",
    ...elementSection(facts),
    "",
    `体質面では、${archetype.constitution.energy}を持ち、${archetype.constitution.rhythm}が見られる傾向があります。`,
    "",
    `## ${title("prescription")}`,
    "",
    `- 基本のケア：${archetype.constitution.care_focus}を心がけましょう。`,
    `- ${ELEMENT_LABELS[top]}のエレメントを活かす：${ELEMENT_FRAGMENTS[top].care}`,
    ...facts.lacking_elements.map(
      (e) => `- ${ELEMENT_LABELS[e]}のエレメントを補う：${ELEMENT_FRAGMENTS[e].care}`
    ),
    "- 毎日の習慣：決まった時間に起きて朝の光を浴び、夜は画面から離れる時間をつくりましょう。",
    "",
    `## ${title("closing")}`,
    "",
    `${facts.birth.name}様、${CLOSING}`,
    "",
    `今日のマントラ：「わたしは${archetype.tendency_tags[0]}を信じ、自分のリズムで進む」`,
    "",
    `※${facts.disclaimer}`,
  ];
  return lines.join("\n");
}

export function renderFallbackReport(kind: ReportKind, facts: ReportFacts): string {
  return kind === "short" ? renderShortFallback(facts) : renderDetailedFallback(facts);
}
