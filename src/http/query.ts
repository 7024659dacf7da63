import type { Context } from "hono";
import { parsePage } from "../domain/pagination.js";

export function pageParam(c: Context): number {
  return parsePage(c.req.query("page"));
}

/** Path params are constrained to digits by the route pattern. */
export function idParam(c: Context, name: string = "id"): number {
  return Number.parseInt(c.req.param(name) ?? "", 10);
}
