/**
 * Static sentence fragments for the deterministic renderer.
 */

import type { BodyId, SignName } from "../../astro/schemas/natalPositions.schema.js";
import type { Element } from "../classification/elements.js";

export type ElementFragments = {
  dominant: string;
  present: string;
  lacking: string;
  care: string;
};

export const ELEMENT_FRAGMENTS: Readonly<Record<Element, ElementFragments>> = {
  fire: {
    dominant:
      "火のエレメントが強い人は、意欲と行動力に恵まれ、物事を始める場面で力を発揮しやすい傾向があります。",
    present:
      "火のエレメントは、必要なときに一歩を踏み出すための原動力として働いている可能性があります。",
    lacking:
      "火のエレメントが少ないため、気持ちが乗るまでに時間がかかることがあるかもしれません。小さな目標を立てて達成感を味わうことが助けになります。",
    care: "体を温める食材を適度に取り入れつつ、熱がこもりすぎないよう休息をはさみましょう。",
  },
  earth: {
    dominant:
      "地のエレメントが強い人は、現実的な感覚と粘り強さを持ち、着実に成果を積み上げていく傾向があります。",
    present:
      "地のエレメントは、生活のリズムや体の感覚を安定させる土台として働いている可能性があります。",
    lacking:
      "地のエレメントが少ないため、生活のリズムが乱れやすいことがあるかもしれません。食事や睡眠の時間をそろえることが安定につながります。",
    care: "根菜や穀物など、季節の食材を使った素朴な食事と、よく歩く習慣がおすすめです。",
  },
  air: {
    dominant:
      "風のエレメントが強い人は、知的好奇心と柔軟な発想に恵まれ、人や情報をつなぐ役割を担いやすい傾向があります。",
    present:
      "風のエレメントは、考えを整理し、周囲と気持ちよく交流するための潤滑油として働いている可能性があります。",
    lacking:
      "風のエレメントが少ないため、考えを言葉にするのに時間がかかることがあるかもしれません。書き出す習慣が思考の風通しを良くします。",
    care: "深い呼吸を意識し、換気の良い場所で過ごす時間や、軽い有酸素運動を取り入れましょう。",
  },
  water: {
    dominant:
      "水のエレメントが強い人は、共感力と感受性が豊かで、人の気持ちや場の空気を敏感に感じ取る傾向があります。",
    present:
      "水のエレメントは、感情を味わい、人との絆を深めるための感受性として働いている可能性があります。",
    lacking:
      "水のエレメントが少ないため、自分の気持ちに気づくのが遅れることがあるかもしれません。一日の終わりに心の状態を振り返る時間が役立ちます。",
    care: "入浴や水辺での散歩など、心と体をゆるめる時間を大切にし、体を冷やしすぎないようにしましょう。",
  },
};

export const BODY_THEMES: Readonly<Record<BodyId, string>> = {
  sun: "太陽は生命力と人生の目的を表し、あなたが輝くための基本的なエネルギーの方向を示します。",
  moon: "月は感情と体のリズムを表し、安心を感じる環境や無意識の反応のしかたを示します。",
  mercury: "水星は思考とコミュニケーションを表し、情報の受け取り方や伝え方の癖を示します。",
  venus: "金星は喜びと調和を表し、心地よいと感じるものや人との関わり方を示します。",
  mars: "火星は行動力と闘志を表し、エネルギーの使い方や挑戦への向き合い方を示します。",
  jupiter: "木星は成長と寛容を表し、あなたが自然に広がっていける分野を示します。",
  saturn: "土星は責任と時間を表し、じっくりと取り組むことで力に変わる課題を示します。",
};

export const SIGN_KEYWORDS: Readonly<Record<SignName, string>> = {
  aries: "率直さと開拓精神",
  taurus: "安定と五感の豊かさ",
  gemini: "好奇心と軽やかな知性",
  cancer: "思いやりと守る力",
  leo: "自己表現と温かな存在感",
  virgo: "細やかさと実務能力",
  libra: "調和と美的感覚",
  scorpio: "集中力と深い洞察",
  sagittarius: "探究心とおおらかさ",
  capricorn: "責任感と長期的な視野",
  aquarius: "独創性と公平さ",
  pisces: "想像力と無償の優しさ",
};

export const PROLOGUE =
  "この鑑定書は、あなたが生まれた瞬間の空に描かれていた天体の配置を読み解き、体と心の傾向をひとつの物語としてお届けするものです。" +
  "星の配置は運命を決めるものではなく、あなたが自分らしく過ごすためのヒントを映す鏡のようなものです。肩の力を抜いて、気になるところから読み進めてください。";

export const CLOSING =
  "星の配置が示すのは、あなたの可能性のほんの一部にすぎません。どの傾向も、意識して使えば長所となり、休ませることで次の力へとつながります。" +
  "今日の自分をいたわりながら、あなたという名の奇跡を生きていってください。";
