import { ZodError } from "zod";

export type StoryErrorCode = "not_found" | "validation" | "storage";

/** Base for every failure a tool reports back to its caller. */
export class StoryServerError extends Error {
  readonly code: StoryErrorCode;

  constructor(code: StoryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

export class NotFoundError extends StoryServerError {
  constructor(message: string) {
    super("not_found", message);
  }
}

export class ValidationError extends StoryServerError {
  constructor(message: string) {
    super("validation", message);
  }
}

/** Filesystem failure. `path` is the location that was being touched. */
export class StorageError extends StoryServerError {
  readonly path: string;

  constructor(action: string, path: string, cause: unknown) {
    super("storage", `Failed to ${action} ${path}: ${describeFsError(cause)}`, { cause });
    this.path = path;
  }
}

function describeFsError(err: unknown): string {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    return code ?? err.message;
  }
  return String(err);
}

export function isErrnoException(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

export function formatZodError(err: ZodError, toolName: string): string {
  const issues = err.issues.map((issue) => {
    const path = issue.path.length > 0 ? `'${issue.path.join(".")}'` : "input";
    return `  ${path}: ${issue.message}`;
  });
  return `Invalid input for '${toolName}':\n${issues.join("\n")}`;
}
