// backend/src/services/__tests__/fixtures.ts

import { createUnitCatalog } from "../../state/unitCatalog";
import type { Turn, Unit } from "../../types/roleplay";

export const FAMILY_QUESTIONS = [
  "你是哪国人？你是哪里人？",
  "你家有几口人？都有谁？",
  "你有几个哥哥？",
  "你有几个弟弟？",
  "你有几个姐姐？",
  "你有几个妹妹？",
  "你有宠物吗？是什么？",
  "你爸爸妈妈多大？",
  "你多大？",
  "她的哥哥也是老师吗？",
  "她的妹妹在哪儿？",
  "她的妹妹几年级？",
];

const FAMILY_KEYWORDS: string[][] = [
  ["哪国", "哪里人"],
  ["几口人", "都有谁", "口"],
  ["几个哥哥", "哥哥"],
  ["几个弟弟", "弟弟"],
  ["几个姐姐", "姐姐"],
  ["几个妹妹", "妹妹"],
  ["宠物", "猫", "狗", "鸟"],
  ["爸爸", "妈妈", "多大"],
  ["你多大", "岁"],
  ["哥哥", "老师"],
  ["妹妹", "在哪儿", "哪里"],
  ["妹妹", "几年级"],
];

export function familyUnit(): Unit {
  return {
    id: "unit2",
    title: "Unit 2: Family",
    objectives: ["Ask about family members"],
    greetings: ["你好！(Nǐ hǎo!)", "嗨！(Hài!)"],
    roleplayGuidance: "Your family has five people.",
    partnerQuestions: ["你家有几口人？"],
    questions: FAMILY_QUESTIONS.map((text, i) => ({ text, keywords: FAMILY_KEYWORDS[i] ?? [] })),
  };
}

export function scheduleUnit(): Unit {
  return {
    id: "unit3",
    title: "Unit 3: Daily Schedule",
    objectives: [],
    greetings: ["你好！(Nǐ hǎo!)"],
    roleplayGuidance: "",
    partnerQuestions: [],
    questions: [
      { text: "你今天几点起床？", keywords: ["起床"] },
      { text: "你周末做什么？", keywords: [] },
    ],
  };
}

export function testCatalog() {
  return createUnitCatalog([familyUnit(), scheduleUnit()]);
}

export const student = (text: string): Turn => ({ role: "student", text });
export const partner = (text: string): Turn => ({ role: "partner", text });
