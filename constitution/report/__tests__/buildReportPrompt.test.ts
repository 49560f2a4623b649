import { describe, expect, it } from "vitest";
import { DETAILED_SECTIONS, buildReportPrompt } from "../buildReportPrompt.js";
import { buildFixtureFacts } from "./fixtures.js";

describe("buildReportPrompt", () => {
  const facts = buildFixtureFacts();

  it("asks for the short target length and names the archetype", () => {
    const prompt = buildReportPrompt("short_report", facts, 1_000);
    expect(prompt.system_prompt).toContain("医療診断ではありません");
    expect(prompt.user_prompt).toContain("Taroさんの簡易体質診断を1,000文字程度で作成してください。");
    expect(prompt.user_prompt).toContain("16元型「The Garden（庭園）」の特徴を中心に説明");
  });

  it("passes only computed facts", () => {
    const { user_prompt } = buildReportPrompt("short_report", facts, 1_000);
    expect(user_prompt).toContain("- 出生: 1990年5月15日 14時30分（東京都）");
    expect(user_prompt).toContain("- 太陽: 牡牛座 24.3°（地）");
    expect(user_prompt).toContain("- 月: 水瓶座 21.0°（風）");
    expect(user_prompt).toContain("- 地: 42.9%");
    expect(user_prompt).toContain("- 優勢な順: 地 > 水 > 火 > 風");
    expect(user_prompt).toContain("- 欠けているエレメント: なし");
    expect(user_prompt).toContain("- 土星: 山羊座 23.0°（地）");
  });

  it("splits the detailed budget across the six sections", () => {
    const { user_prompt } = buildReportPrompt("detailed_report", facts, 12_000);
    expect(DETAILED_SECTIONS.reduce((acc, s) => acc + s.share, 0)).toBeCloseTo(1, 9);
    expect(user_prompt).toContain("全体で12,000文字程度で作成してください。");
    expect(user_prompt).toContain("- 序章：星空からの招待状（約1,000文字）");
    expect(user_prompt).toContain("- 第1部：魂のコアパターン（約2,500文字）");
    expect(user_prompt).toContain("- 第2部：あなたの魂の評議会（7天体）（約3,000文字）");
    expect(user_prompt).toContain("- 第3部：占星医学的な体質傾向（約2,000文字）");
    expect(user_prompt).toContain("- 第4部：統合ホリスティック処方箋（約2,500文字）");
    expect(user_prompt).toContain("- 結び：あなたという名の奇跡を生きる（約1,000文字）");
  });
});
