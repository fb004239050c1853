import path from "node:path";
import { ValidationError } from "../errors";

function contains(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  if (rel === "") return true;
  if (rel === ".." || rel.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(rel);
}

/**
 * Resolves `input` against each allowed root and returns the first absolute path that
 * stays inside its root. No roots means nothing is allowed.
 */
export function validateLocalFilePath(input: string, roots: readonly string[]): string {
  for (const root of roots) {
    const base = path.resolve(root);
    const candidate = path.resolve(base, input);
    if (contains(base, candidate)) return candidate;
  }
  throw new ValidationError("path_traversal", "File path is outside the allowed directories");
}
