export interface CategoryRow {
  id: number;
  type: string;
}

export interface QuestionRow {
  id: number;
  question: string;
  answer: string;
  category: number;
  difficulty: number;
}

export type NewQuestion = Omit<QuestionRow, "id">;

/** id → label, keyed by the stringified id as it appears in JSON. */
export type CategoryMap = Record<string, string>;

export interface FormattedQuestion {
  id: number;
  question: string;
  answer: string;
  category: number;
  difficulty: number;
}
