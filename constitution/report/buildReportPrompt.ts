import { ELEMENTS, elementForSign } from "../classification/elements.js";
import { BODY_LABELS, ELEMENT_LABELS, formatPercent, formatPlacement } from "./labels.js";
import { positionOf, type ReportFacts } from "./reportFacts.js";
import type { ReportTemplateId } from "./reportTargets.js";

export type AssembledPrompt = {
  system_prompt: string;
  user_prompt: string;
};

/**
 * Detailed report sections and their share of the character budget.
 */
export const DETAILED_SECTIONS = [
  { key: "prologue", title: "序章：星空からの招待状", share: 1 / 12 },
  { key: "core_pattern", title: "第1部：魂のコアパターン", share: 2.5 / 12 },
  { key: "soul_council", title: "第2部：あなたの魂の評議会（7天体）", share: 3 / 12 },
  { key: "constitution", title: "第3部：占星医学的な体質傾向", share: 2 / 12 },
  { key: "prescription", title: "第4部：統合ホリスティック処方箋", share: 2.5 / 12 },
  { key: "closing", title: "結び：あなたという名の奇跡を生きる", share: 1 / 12 },
] as const;

function factsBlock(facts: ReportFacts): string {
  const sun = positionOf(facts, "sun");
  const moon = positionOf(facts, "moon");
  const { archetype } = facts;

  const placements = facts.positions
    .map(
      (p) =>
        `- ${BODY_LABELS[p.body]}: ${formatPlacement(p.sign, p.degree_in_sign)}（${
          ELEMENT_LABELS[elementForSign(p.sign)]
        }）`
    )
    .join("\n");

  const balance = ELEMENTS.map(
    (e) => `- ${ELEMENT_LABELS[e]}: ${formatPercent(facts.element_percentages[e])}`
  ).join("\n");

  return `
【基本情報】
- 名前: ${facts.birth.name}さん
- 出生: ${facts.birth_local}（${facts.geo.region_name}）
- 16元型: ${archetype.display_name}
- 元型の要約: ${archetype.short_description}
- 元型のキーワード: ${archetype.tendency_tags.join("、")}
- 太陽: ${formatPlacement(sun.sign, sun.degree_in_sign)}（${ELEMENT_LABELS[archetype.sun_element]}）
- 月: ${formatPlacement(moon.sign, moon.degree_in_sign)}（${ELEMENT_LABELS[archetype.moon_element]}）

【エレメントバランス】
${balance}
- 優勢な順: ${facts.dominant_elements.map((e) => ELEMENT_LABELS[e]).join(" > ")}
- 欠けているエレメント: ${
    facts.lacking_elements.length
      ? facts.lacking_elements.map((e) => ELEMENT_LABELS[e]).join("、")
      : "なし"
  }

【7天体の配置】
${placements}
`.trim();
}

const SYSTEM_PROMPT = `
あなたは占星医学の語り手です。与えられた出生データの事実だけを根拠に、温かく励ましのある日本語の文章を書きます。

【重要な注意】
- これはエンターテインメント目的の体質傾向分析です。医療診断ではありません。
- 「傾向」「可能性」という表現を使い、断定的な医療的判断や治療の指示は避けてください。
- 与えられていない天体、星座、数値を新たに作らないでください。
- 16元型の名前とエレメントの割合は、与えられた表記のまま使ってください。
`.trim();

function shortInstructions(facts: ReportFacts, target: number): string {
  return `
${facts.birth.name}さんの簡易体質診断を${target.toLocaleString("en-US")}文字程度で作成してください。

【診断文章の要件】
1. 16元型「${facts.archetype.display_name}」の特徴を中心に説明
2. 最も強いエレメントと2番目のエレメントの割合に触れて特徴を分析
3. 体質的な傾向と注意点（医療診断ではないことを明記）
4. 日常生活でのアドバイス
5. 温かく励ましのある文体
6. ${target.toLocaleString("en-US")}文字程度（多すぎても少なすぎてもいけません）
`.trim();
}

function detailedInstructions(facts: ReportFacts, target: number): string {
  const sections = DETAILED_SECTIONS.map((s) => {
    const budget = Math.round((target * s.share) / 100) * 100;
    return `- ${s.title}（約${budget.toLocaleString("en-US")}文字）`;
  }).join("\n");

  return `
${facts.birth.name}様へお届けする詳細な体質鑑定書を、全体で${target.toLocaleString(
    "en-US"
  )}文字程度で作成してください。

【構成】見出しを付けて、次の6つのセクションで書いてください。
${sections}

【各セクションの要件】
- 序章では出生データに触れ、エンターテインメント目的であることを自然に伝える
- 第1部では16元型「${facts.archetype.display_name}」を太陽と月のエレメントの組み合わせから解説する
- 第2部では7天体それぞれの配置と、その傾向の活かし方を述べる
- 第3部ではエレメントバランスの割合をすべて示し、体質傾向として表現する
- 第4部では食養生、アロマ、ライフスタイルの提案を具体的に挙げる
- 結びは希望と励ましに満ちた内容にし、最後に短いマントラを添える
`.trim();
}

export function buildReportPrompt(
  template_id: ReportTemplateId,
  facts: ReportFacts,
  target_length: number
): AssembledPrompt {
  const instructions =
    template_id === "short_report"
      ? shortInstructions(facts, target_length)
      : detailedInstructions(facts, target_length);

  return {
    system_prompt: SYSTEM_PROMPT,
    user_prompt: `${instructions}\n\n${factsBlock(facts)}`,
  };
}
