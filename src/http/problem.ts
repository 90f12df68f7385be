export interface FieldError {
  path: string;
  message: string;
}

export type ProblemCode = "INVALID_ARGUMENT" | "UNSUPPORTED_MEDIA_TYPE" | "NOT_FOUND" | "INTERNAL";

/** RFC 7807 document, plus the code, request id and field errors. */
export interface Problem {
  type: string;
  title: string;
  status: number;
  code: ProblemCode;
  detail?: string;
  instance?: string;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

const PROBLEM_BASE = "https://errors.grid-word-search.local/";

const CATALOG: Record<ProblemCode, { status: number; title: string }> = {
  INVALID_ARGUMENT: { status: 400, title: "Invalid argument" },
  UNSUPPORTED_MEDIA_TYPE: { status: 415, title: "Unsupported media type" },
  NOT_FOUND: { status: 404, title: "Not found" },
  INTERNAL: { status: 500, title: "Internal error" },
};

export function problem(code: ProblemCode, fields: Omit<Problem, "type" | "title" | "status" | "code"> = {}): Problem {
  const { status, title } = CATALOG[code];
  return {
    type: PROBLEM_BASE + code.toLowerCase().replace(/_/g, "-"),
    title,
    status,
    code,
    ...fields,
  };
}
