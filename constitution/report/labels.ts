import type { BodyId, SignName } from "../../astro/schemas/natalPositions.schema.js";
import type { Element } from "../classification/elements.js";

export const SIGN_LABELS: Readonly<Record<SignName, string>> = {
  aries: "牡羊座",
  taurus: "牡牛座",
  gemini: "双子座",
  cancer: "蟹座",
  leo: "獅子座",
  virgo: "乙女座",
  libra: "天秤座",
  scorpio: "蠍座",
  sagittarius: "射手座",
  capricorn: "山羊座",
  aquarius: "水瓶座",
  pisces: "魚座",
};

export const BODY_LABELS: Readonly<Record<BodyId, string>> = {
  sun: "太陽",
  moon: "月",
  mercury: "水星",
  venus: "金星",
  mars: "火星",
  jupiter: "木星",
  saturn: "土星",
};

export const ELEMENT_LABELS: Readonly<Record<Element, string>> = {
  fire: "火",
  earth: "地",
  air: "風",
  water: "水",
};

/** "牡牛座 24.3°" */
export function formatPlacement(sign: SignName, degreeInSign: number): string {
  return `${SIGN_LABELS[sign]} ${degreeInSign.toFixed(1)}°`;
}

/** "42.9%" */
export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}
