import { ANY_CATEGORY } from "../domain/policy.js";
import type { QuestionRepository } from "../domain/questions/questionRepository.js";
import { pickRandom, type RandomIndex } from "../domain/quiz.js";
import type { FormattedQuestion } from "../domain/types.js";
import { formatQuestion } from "../presentation/questionPresenter.js";

export interface QuizRequest {
  previousQuestions: readonly number[];
  /** ANY_CATEGORY draws from every category */
  categoryId: number;
}

export interface QuizService {
  /** @returns null once every candidate has been asked */
  nextQuestion(req: QuizRequest): Promise<FormattedQuestion | null>;
}

export class QuizServiceImpl implements QuizService {
  private readonly repo: QuestionRepository;
  private readonly randomIndex: RandomIndex | undefined;

  public constructor(repo: QuestionRepository, randomIndex?: RandomIndex) {
    this.repo = repo;
    this.randomIndex = randomIndex;
  }

  public async nextQuestion(req: QuizRequest): Promise<FormattedQuestion | null> {
    const candidates = await this.repo.listExcluding(
      req.previousQuestions,
      req.categoryId === ANY_CATEGORY ? undefined : req.categoryId
    );
    const picked = pickRandom(candidates, this.randomIndex);
    return picked ? formatQuestion(picked) : null;
  }
}
