import { ApiError } from "../domain/errors.js";
import { paginate } from "../domain/pagination.js";
import type { QuestionRepository } from "../domain/questions/questionRepository.js";
import type {
  FormattedQuestion,
  NewQuestion,
  QuestionRow,
} from "../domain/types.js";
import { formatQuestions } from "../presentation/questionPresenter.js";
import { logger } from "../logger.js";

export interface QuestionPage {
  questions: FormattedQuestion[];
  total: number;
}

export interface QuestionPageWithCategories extends QuestionPage {
  /** Category of every question in the selection, in id order. */
  categoryIds: number[];
}

export interface QuestionService {
  /** @throws ApiError 404 when the page holds no questions */
  listQuestions(page: number): Promise<QuestionPageWithCategories>;
  /** @throws ApiError 404 when the id is unknown */
  deleteQuestion(id: number, page: number): Promise<QuestionPage>;
  /** @throws ApiError 422 when question or answer text is empty */
  createQuestion(
    input: NewQuestion,
    page: number
  ): Promise<QuestionPage & { id: number }>;
  /** @throws ApiError 422 when the term is empty */
  searchQuestions(
    term: string,
    page: number
  ): Promise<QuestionPageWithCategories>;
  /** @throws ApiError 422 when no question references the category */
  questionsByCategory(categoryId: number, page: number): Promise<QuestionPage>;
}

function pageOf(rows: readonly QuestionRow[], page: number): FormattedQuestion[] {
  return formatQuestions(paginate(rows, page));
}

export class QuestionServiceImpl implements QuestionService {
  private readonly repo: QuestionRepository;

  public constructor(repo: QuestionRepository) {
    this.repo = repo;
  }

  public async listQuestions(page: number): Promise<QuestionPageWithCategories> {
    const rows = await this.repo.listAll();
    const questions = pageOf(rows, page);
    if (questions.length === 0) {
      throw ApiError.notFound(`no questions on page ${page}`);
    }
    return {
      questions,
      total: rows.length,
      categoryIds: rows.map((r) => r.category),
    };
  }

  public async deleteQuestion(id: number, page: number): Promise<QuestionPage> {
    const deleted = await this.repo.deleteById(id);
    if (!deleted) {
      throw ApiError.notFound(`question ${id} does not exist`);
    }
    logger.info(`Question deleted: id=${id}`);

    const rows = await this.repo.listAll();
    return { questions: pageOf(rows, page), total: rows.length };
  }

  public async createQuestion(
    input: NewQuestion,
    page: number
  ): Promise<QuestionPage & { id: number }> {
    if (input.question === "" || input.answer === "") {
      throw ApiError.unprocessable("question and answer must not be empty");
    }

    const id = await this.repo.insert(input);
    logger.info(`Question added: id=${id}, category=${input.category}`);

    const rows = await this.repo.listAll();
    return { id, questions: pageOf(rows, page), total: rows.length };
  }

  public async searchQuestions(
    term: string,
    page: number
  ): Promise<QuestionPageWithCategories> {
    if (term === "") {
      throw ApiError.unprocessable("searchTerm must not be empty");
    }
    const rows = await this.repo.search(term);
    return {
      questions: pageOf(rows, page),
      total: rows.length,
      categoryIds: rows.map((r) => r.category),
    };
  }

  public async questionsByCategory(
    categoryId: number,
    page: number
  ): Promise<QuestionPage> {
    // Keyed on question references, not on the categories table.
    if (!(await this.repo.isCategoryInUse(categoryId))) {
      throw ApiError.unprocessable(`no questions in category ${categoryId}`);
    }
    const rows = await this.repo.listByCategory(categoryId);
    return { questions: pageOf(rows, page), total: rows.length };
  }
}
