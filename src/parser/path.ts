import type { ZodError } from "zod";
import { TweetDecodeError } from "../errors";

export const ROOT_PATH = "$";

/** Appends JSON path segments: `child("$.a", "b", 0)` → `$.a.b[0]`. */
export function child(path: string, ...segments: Array<string | number>): string {
  return segments.reduce<string>(
    (acc, segment) => (typeof segment === "number" ? `${acc}[${segment}]` : `${acc}.${segment}`),
    path
  );
}

/** Turns the first zod issue into a TweetDecodeError anchored at `path`. */
export function toDecodeError(path: string, error: ZodError): TweetDecodeError {
  const issue = error.issues[0];
  if (!issue) return new TweetDecodeError(path);
  return new TweetDecodeError(child(path, ...issue.path), issue.message);
}
