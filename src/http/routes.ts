import { isInvalidInput } from "../core/index.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem, type ProblemCode } from "./problem.js";
import { asArray, isRecord, pushErr } from "./validation.js";
import type { GridStore } from "./engine.js";

export const SERVICE = "grid-word-search";
export const VERSION = "0.1.0";

export const MAX_ROWS = 1000;
export const MAX_ROW_LENGTH = 1000;
export const MAX_WORDS = 10000;

export interface RouteContext {
  store: GridStore;
  startedAt: number;
}

export interface RouteRequest {
  method: string;
  pathname: string;
  contentType?: string;
  rawBody: string;
  requestId: string;
}

export interface RouteResponse {
  status: number;
  contentType?: string;
  body?: unknown;
}

const GRID_PATH = /^\/grids\/([^/]+)(\/search)?$/;

/**
 * Routes one request. Malformed input becomes a problem response;
 * anything else thrown is left to the caller.
 */
export function dispatch(ctx: RouteContext, req: RouteRequest): RouteResponse {
  const { method, pathname, requestId } = req;
  const fail = (code: ProblemCode, detail: string, errors?: FieldError[]): RouteResponse =>
    problemResponse(problem(code, { detail, instance: pathname, requestId, errors }));

  if (method === "GET" && pathname === "/health") {
    return json(200, {
      status: "ok",
      service: SERVICE,
      version: VERSION,
      uptimeMs: Date.now() - ctx.startedAt,
      grids: ctx.store.size(),
    });
  }

  if (method === "POST" && pathname === "/grids") {
    if (!isJson(req.contentType)) {
      return fail("UNSUPPORTED_MEDIA_TYPE", "content-type must be application/json");
    }
    const body = parseJson(req.rawBody);
    if (!body.ok) return fail("INVALID_ARGUMENT", "malformed json");
    if (!isRecord(body.value)) return fail("INVALID_ARGUMENT", "body must be an object");

    const errors: FieldError[] = [];
    const rowsVal = asArray(errors, "$.rows", body.value.rows, MAX_ROWS);
    const rows: string[] = [];
    rowsVal?.forEach((r, i) => {
      if (typeof r !== "string") {
        pushErr(errors, `$.rows[${i}]`, "must be a string");
      } else if (r.length > MAX_ROW_LENGTH) {
        pushErr(errors, `$.rows[${i}]`, `must be at most ${MAX_ROW_LENGTH} characters`);
      } else {
        rows.push(r);
      }
    });
    if (errors.length) return fail("INVALID_ARGUMENT", "invalid request", errors);

    try {
      const record = ctx.store.create(rows);
      return json(201, { id: record.id, rowCount: record.index.rowCount, colCount: record.index.colCount });
    } catch (e) {
      if (isInvalidInput(e)) return fail("INVALID_ARGUMENT", e.message);
      throw e;
    }
  }

  const m = GRID_PATH.exec(pathname);
  if (m) {
    const id = m[1]!;
    const isSearch = m[2] !== undefined;

    if (!isSearch && method === "GET") {
      const record = ctx.store.get(id);
      if (!record) return fail("NOT_FOUND", "grid not found");
      return json(200, {
        id: record.id,
        rowCount: record.index.rowCount,
        colCount: record.index.colCount,
        rows: record.index.rows(),
        columns: record.index.columns(),
      });
    }

    if (!isSearch && method === "DELETE") {
      if (!ctx.store.delete(id)) return fail("NOT_FOUND", "grid not found");
      return { status: 204 };
    }

    if (isSearch && method === "POST") {
      if (!isJson(req.contentType)) {
        return fail("UNSUPPORTED_MEDIA_TYPE", "content-type must be application/json");
      }
      const started = Date.now();
      const body = parseJson(req.rawBody);
      if (!body.ok) return fail("INVALID_ARGUMENT", "malformed json");
      if (!isRecord(body.value)) return fail("INVALID_ARGUMENT", "body must be an object");

      const errors: FieldError[] = [];
      const wordsVal = asArray(errors, "$.words", body.value.words, MAX_WORDS);
      const words: Array<string | null> = [];
      wordsVal?.forEach((w, i) => {
        if (typeof w === "string" || w === null) words.push(w);
        else pushErr(errors, `$.words[${i}]`, "must be a string or null");
      });
      if (errors.length) return fail("INVALID_ARGUMENT", "invalid request", errors);

      const found = ctx.store.search(id, words);
      if (!found) return fail("NOT_FOUND", "grid not found");
      return json(200, { words: found, tookMs: Date.now() - started });
    }
  }

  return fail("NOT_FOUND", "not found");
}

/** 500 answer for an error `dispatch` let through. */
export function internalError(pathname: string, requestId: string): RouteResponse {
  return problemResponse(problem("INTERNAL", { detail: "internal error", instance: pathname, requestId }));
}

function problemResponse(body: Problem): RouteResponse {
  return { status: body.status, contentType: PROBLEM_CONTENT_TYPE, body };
}

function json(status: number, body: unknown): RouteResponse {
  return { status, contentType: "application/json", body };
}

function isJson(contentType: string | undefined): boolean {
  return (contentType ?? "").split(";")[0]!.trim().toLowerCase() === "application/json";
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  if (!raw.length) return { ok: true, value: null };
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}
