import type { CategoryRepository } from "../domain/categories/categoryRepository.js";
import type { CategoryMap } from "../domain/types.js";

export interface CategoryService {
  getCategoryMap(): Promise<CategoryMap>;
}

export class CategoryServiceImpl implements CategoryService {
  private readonly repo: CategoryRepository;

  public constructor(repo: CategoryRepository) {
    this.repo = repo;
  }

  public async getCategoryMap(): Promise<CategoryMap> {
    const rows = await this.repo.listAll();
    const map: CategoryMap = {};
    for (const c of rows) map[String(c.id)] = c.type;
    return map;
  }
}
