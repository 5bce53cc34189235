/**
 * SOP REVIEW ERRORS
 *
 * Structural violations are data (ReviewError records collected by the validator).
 * The Error subclasses below are for the boundary: unparseable input, a caller
 * that insists on a valid document, and schema definitions the error mapper
 * cannot classify.
 */

export const reviewErrorKinds = [
  "UnknownField",
  "MissingField",
  "TypeMismatch",
  "EnumViolation",
  "PatternViolation",
  "LengthViolation",
  "RangeViolation",
  "CardinalityViolation",
  "DuplicateItem",
  "MissingRequiredVariant",
] as const;
export type ReviewErrorKind = typeof reviewErrorKinds[number];

export type PathSegment = string | number;

export interface ReviewError {
  kind: ReviewErrorKind;
  path: PathSegment[];
  message: string;
}

export function formatPath(path: readonly PathSegment[]): string {
  return path.length > 0 ? path.map(String).join("/") : "<root>";
}

function compareSegments(a: PathSegment, b: PathSegment): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function comparePaths(a: readonly PathSegment[], b: readonly PathSegment[]): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const order = compareSegments(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

/** Stable: errors on the same path keep the order they were reported in. */
export function sortReviewErrors(errors: readonly ReviewError[]): ReviewError[] {
  return [...errors].sort((a, b) => comparePaths(a.path, b.path));
}

export function formatValidationErrors(errors: readonly ReviewError[]): string {
  const lines = errors.map(e => `${formatPath(e.path)}: ${e.message}`);
  return ["Invalid SOP payload:", ...lines].join("\n");
}

export class MalformedInputError extends Error {
  constructor(message: string, public readonly detail: string) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export class ReviewValidationError extends Error {
  constructor(public readonly errors: ReviewError[]) {
    super(formatValidationErrors(errors));
    this.name = "ReviewValidationError";
  }
}

export class SchemaConfigurationError extends Error {
  constructor(message: string, public readonly keyword?: string) {
    super(message);
    this.name = "SchemaConfigurationError";
  }
}
