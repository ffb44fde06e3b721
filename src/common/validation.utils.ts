import type { ZodError, ZodIssue } from "zod";

/** Renders an issue path as `config.categories[0].name`. */
export function formatIssuePath(path: ZodIssue["path"]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") return `${acc}[${String(segment)}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, "");
}

/**
 * One line per distinct issue, joined with "; ". Used as the message of 400
 * responses.
 */
export function formatZodError(error: ZodError): string {
  const messages = error.issues.map((issue) => {
    const path = formatIssuePath(issue.path);
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return [...new Set(messages)].join("; ");
}
