export const QUESTIONS_PER_PAGE = 10 as const;

/** quiz_category.id that stands for "every category". */
export const ANY_CATEGORY = 0 as const;

export const DEFAULT_PAGE = 1 as const;
