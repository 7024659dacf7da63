import type { NewQuestion, QuestionRow } from "../types.js";

/** Every list comes back ordered by id ascending. */
export interface QuestionRepository {
  listAll(): Promise<QuestionRow[]>;
  /** Case-insensitive substring match on the question text. */
  search(term: string): Promise<QuestionRow[]>;
  listByCategory(categoryId: number): Promise<QuestionRow[]>;
  /**
   * Questions whose id is not in `excludeIds`, limited to `categoryId` when
   * one is given.
   */
  listExcluding(
    excludeIds: readonly number[],
    categoryId?: number
  ): Promise<QuestionRow[]>;
  /** Whether any question references `categoryId`. */
  isCategoryInUse(categoryId: number): Promise<boolean>;
  insert(q: NewQuestion): Promise<number>;
  /** @returns false when no question had that id */
  deleteById(id: number): Promise<boolean>;
  count(): Promise<number>;
}
