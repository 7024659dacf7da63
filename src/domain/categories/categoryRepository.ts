import type { CategoryRow } from "../types.js";

export interface CategoryRepository {
  listAll(): Promise<CategoryRow[]>;
  count(): Promise<number>;
}
