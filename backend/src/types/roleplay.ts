// backend/src/types/roleplay.ts

export type TurnRole = "student" | "partner";

export type Turn = {
  role: TurnRole;
  text: string;
};

export type Transcript = readonly Turn[];

export type UnitQuestion = {
  text: string;           // literal target question (Chinese script)
  keywords: readonly string[];   // coverage evidence; empty means "use the question text"
};

export type Unit = {
  id: string;
  title: string;
  objectives: readonly string[];
  greetings: readonly string[];
  roleplayGuidance: string;
  partnerQuestions: readonly string[];   // questions the partner itself may ask
  questions: readonly UnitQuestion[];
};

export type UnitSummary = {
  id: string;
  title: string;
  objectives: string[];
  totalQuestions: number;
};

export type FactValue = "asserted_present" | "asserted_absent" | "unknown";

export type FactTable = {
  hasOlderBrother: FactValue;
  hasYoungerBrother: FactValue;
  hasOlderSister: FactValue;
  hasYoungerSister: FactValue;
  hasPet: FactValue;
};

export type FactKey = keyof FactTable;

export type SiblingFactKey = Exclude<FactKey, "hasPet">;

export type FamilyEntity =
  | "older_brother"
  | "younger_brother"
  | "older_sister"
  | "younger_sister"
  | "pet";

export type CoverageState = {
  covered: number[];
  nextIndex: number;
  remaining: string[];
};

export type Directive = {
  unitId: string;
  remaining: string[];
  nextIndex: number;
  nextQuestion: string;
  covered: number[];
  prohibited: FamilyEntity[];
};
