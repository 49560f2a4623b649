import { describe, expect, it } from "vitest";
import { ELEMENT_FRAGMENTS } from "../fallbackFragments.js";
import { renderFallbackReport } from "../renderFallbackReport.js";
import { DISCLAIMER } from "../reportTargets.js";
import { ALL_EARTH_LONGITUDES, buildFixtureFacts } from "./fixtures.js";

describe("renderFallbackReport (short)", () => {
  const facts = buildFixtureFacts();

  it("names the archetype, lists every element percentage and ends with the disclaimer", () => {
    const lines = renderFallbackReport("short", facts).split("\n");

    expect(lines[0]).toBe("Taroさんの体質傾向レポート（簡易版）");
    expect(lines[2]).toBe(
      "あなたの16元型は「The Garden（庭園）」です。現実的な感覚と軽やかな発想が調和する、育てる力に優れたタイプです。"
    );
    expect(lines[3]).toBe(
      "太陽は牡牛座 24.3°（地のエレメント）、月は水瓶座 21.0°（風のエレメント）にあり、この組み合わせがあなたの元型を形づくっています。"
    );
    expect(lines[5]).toBe("エレメントバランス：火 14.3% ／ 地 42.9% ／ 風 14.3% ／ 水 28.6%");
    expect(lines[6]).toBe(
      `最も強いエレメントは地（42.9%）、次いで水（28.6%）です。${ELEMENT_FRAGMENTS.earth.dominant}`
    );
    expect(lines[8]).toBe("キーワード：調和、計画性、育成力");
    expect(lines[lines.length - 1]).toBe(`※${DISCLAIMER}`);
  });

  it("is deterministic", () => {
    expect(renderFallbackReport("short", facts)).toBe(renderFallbackReport("short", buildFixtureFacts()));
  });

  it("mentions lacking elements when a chart has them", () => {
    const lines = renderFallbackReport("short", buildFixtureFacts(ALL_EARTH_LONGITUDES)).split("\n");
    expect(lines[2]).toContain("「The Bedrock（岩盤）」");
    expect(lines[5]).toBe("エレメントバランス：火 0.0% ／ 地 100.0% ／ 風 0.0% ／ 水 0.0%");
    expect(lines[6]).toBe(
      `すべての天体が地（100.0%）のエレメントに集まっています。${ELEMENT_FRAGMENTS.earth.dominant}`
    );
    expect(lines[7]).toBe(`火・風・水のエレメントには天体がありません。${ELEMENT_FRAGMENTS.fire.lacking}`);
  });
});

describe("renderFallbackReport (detailed)", () => {
  const text = renderFallbackReport("detailed", buildFixtureFacts());
  const lines = text.split("\n");

  it("opens with the dedication and birth line", () => {
    expect(lines[0]).toBe("# Taro様へ捧ぐ 占星医学体質鑑定書");
    expect(lines[2]).toBe("出生：1990年5月15日 14時30分（東京都）");
  });

  it("contains all six sections in order", () => {
    const headings = lines.filter((line) => line.startsWith("## "));
    expect(headings).toEqual([
      "## 序章：星空からの招待状",
      "## 第1部：魂のコアパターン「The Garden（庭園）」",
      "## 第2部：あなたの魂の評議会（7天体）",
      "## 第3部：占星医学的な体質傾向",
      "## 第4部：統合ホリスティック処方箋",
      "## 結び：あなたという名の奇跡を生きる",
    ]);
  });

  it("describes each of the seven bodies", () => {
    const bodies = lines.filter((line) => line.startsWith("### "));
    expect(bodies).toEqual([
      "### 太陽：牡牛座 24.3°（地）",
      "### 月：水瓶座 21.0°（風）",
      "### 水星：牡牛座 10.0°（地）",
      "### 金星：牡羊座 10.0°（火）",
      "### 火星：魚座 5.0°（水）",
      "### 木星：蟹座 10.0°（水）",
      "### 土星：山羊座 23.0°（地）",
    ]);
  });

  it("lists every element with its percentage", () => {
    expect(lines).toContain(`- 火 14.3%：${ELEMENT_FRAGMENTS.fire.present}`);
    expect(lines).toContain(`- 地 42.9%：${ELEMENT_FRAGMENTS.earth.dominant}`);
    expect(lines).toContain(`- 風 14.3%：${ELEMENT_FRAGMENTS.air.present}`);
    expect(lines).toContain(`- 水 28.6%：${ELEMENT_FRAGMENTS.water.present}`);
    expect(lines[lines.length - 1]).toBe(`※${DISCLAIMER}`);
  });
});
