import type { Context } from "hono";
import { z } from "zod";
import { ApiError } from "../domain/errors.js";
import { ANY_CATEGORY } from "../domain/policy.js";

/** An integer sent either as a JSON number or as a numeric string ("3"). */
const IntLike = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, "expected an integer")
    .transform((s) => Number.parseInt(s, 10)),
]);

export const CreateQuestionBody = z.object({
  question: z.string(),
  answer: z.string(),
  category: IntLike,
  difficulty: IntLike,
});

export const SearchBody = z.object({
  searchTerm: z.string(),
});

export const QuizBody = z.object({
  previous_questions: z.array(z.number().int()),
  quiz_category: z
    .object({ id: IntLike.optional() })
    .transform((qc) => ({ id: qc.id ?? ANY_CATEGORY })),
});

export type CreateQuestionInput = z.output<typeof CreateQuestionBody>;
export type SearchInput = z.output<typeof SearchBody>;
export type QuizInput = z.output<typeof QuizBody>;

/**
 * Reads the request body as a JSON object.
 * @throws ApiError 400 when the body is not JSON or not an object
 */
export async function readJsonObject(c: Context): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await c.req.json<unknown>();
  } catch {
    throw ApiError.badRequest("request body is not valid JSON");
  }
  if (!isRecord(body)) {
    throw ApiError.badRequest("request body must be a JSON object");
  }
  return body;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** @throws ApiError 422 listing every failed field */
export function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  body: Record<string, unknown>
): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "body"}: ${i.message}`)
      .join("; ");
    throw ApiError.unprocessable(detail);
  }
  return result.data;
}

export async function readBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S
): Promise<z.output<S>> {
  return parseBody(schema, await readJsonObject(c));
}
