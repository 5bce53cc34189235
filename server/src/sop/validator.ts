/**
 * SOP PAYLOAD VALIDATOR
 *
 * Compiles the schema model with Ajv (allErrors, so every violation is collected
 * in one pass) and translates Ajv's error objects into ReviewError records:
 * one kind per failed keyword, paths as segment arrays that point at the
 * offending field, sorted by path.
 */

import Ajv2020 from "ajv/dist/2020";
import equal from "fast-deep-equal";
import type { ErrorObject, SchemaValidateFunction, ValidateFunction } from "ajv";
import type { SopReviewDocument } from "@shared/schema";
import {
  SchemaConfigurationError,
  sortReviewErrors,
  type PathSegment,
  type ReviewError,
  type ReviewErrorKind,
} from "./errors";
import { REQUIRED_VARIANTS_KEYWORD, RequiredVariantRuleZ, sopSchema, type SchemaModel } from "./schemaModel";

export type ValidationResult =
  | { valid: true; document: SopReviewDocument; errors: [] }
  | { valid: false; errors: ReviewError[] };

// ═══════════════════════════════════════════════════════════════════════════════
// CROSS-FIELD RULE: x-requiredVariants
// ═══════════════════════════════════════════════════════════════════════════════

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const validateRequiredVariants: SchemaValidateFunction = function (rule: unknown, data: unknown): boolean {
  const parsedRule = RequiredVariantRuleZ.safeParse(rule);
  if (!parsedRule.success || !Array.isArray(data)) {
    return true;
  }
  const { field, values } = parsedRule.data;
  const missing = values.filter(value => !data.some(item => isRecord(item) && item[field] === value));
  if (missing.length === 0) {
    return true;
  }
  validateRequiredVariants.errors = missing.map(value => ({
    keyword: REQUIRED_VARIANTS_KEYWORD,
    message: `must contain at least one item with ${field} "${value}"`,
    params: { field, value },
  }));
  return false;
};

function createAjv(): Ajv2020 {
  const ajv = new Ajv2020({
    strict: false,
    allErrors: true,
    verbose: true,
  });
  ajv.addKeyword({
    keyword: REQUIRED_VARIANTS_KEYWORD,
    type: "array",
    schemaType: "object",
    errors: true,
    validate: validateRequiredVariants,
  });
  return ajv;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR TRANSLATION
// ═══════════════════════════════════════════════════════════════════════════════

const KEYWORD_KINDS: Record<string, ReviewErrorKind> = {
  additionalProperties: "UnknownField",
  required: "MissingField",
  type: "TypeMismatch",
  enum: "EnumViolation",
  pattern: "PatternViolation",
  minLength: "LengthViolation",
  minimum: "RangeViolation",
  maximum: "RangeViolation",
  minItems: "CardinalityViolation",
  uniqueItems: "DuplicateItem",
  [REQUIRED_VARIANTS_KEYWORD]: "MissingRequiredVariant",
};

function stringParam(error: ErrorObject, name: string): string | undefined {
  const value: unknown = error.params[name];
  return typeof value === "string" ? value : undefined;
}

/**
 * Turns an Ajv instancePath ("/step2/files/0/type") into segments, using the
 * document itself to tell array indices from property names that look numeric.
 */
export function instancePathToSegments(instancePath: string, document: unknown): PathSegment[] {
  if (instancePath === "") return [];
  const segments: PathSegment[] = [];
  let node: unknown = document;
  for (const encoded of instancePath.slice(1).split("/")) {
    const token = encoded.replace(/~1/g, "/").replace(/~0/g, "~");
    if (Array.isArray(node) && /^\d+$/.test(token)) {
      const index = Number(token);
      segments.push(index);
      node = node[index];
    } else {
      segments.push(token);
      node = isRecord(node) ? node[token] : undefined;
    }
  }
  return segments;
}

function describeValue(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}

function valueAt(document: unknown, path: readonly PathSegment[]): unknown {
  let node = document;
  for (const segment of path) {
    if (typeof segment === "number") {
      node = Array.isArray(node) ? node[segment] : undefined;
    } else {
      node = isRecord(node) ? node[segment] : undefined;
    }
  }
  return node;
}

/** Every item equal to an earlier one, paired with the first earlier item it repeats. */
export function findDuplicateItems(items: readonly unknown[]): Array<{ index: number; duplicateOf: number }> {
  const duplicates: Array<{ index: number; duplicateOf: number }> = [];
  for (let j = 1; j < items.length; j++) {
    const i = items.findIndex((item, k) => k < j && equal(item, items[j]));
    if (i >= 0) {
      duplicates.push({ index: j, duplicateOf: i });
    }
  }
  return duplicates;
}

/**
 * One Ajv error becomes one ReviewError, except uniqueItems: Ajv stops at the
 * first equal pair, so the array is rescanned and every repeat is reported.
 */
export function toReviewErrors(error: ErrorObject, document: unknown): ReviewError[] {
  const kind = Object.hasOwn(KEYWORD_KINDS, error.keyword) ? KEYWORD_KINDS[error.keyword] : undefined;
  if (!kind) {
    throw new SchemaConfigurationError(`No error kind for schema keyword "${error.keyword}"`, error.keyword);
  }
  const path = instancePathToSegments(error.instancePath, document);
  const fallbackMessage = error.message ?? "validation error";

  switch (kind) {
    case "UnknownField": {
      const field = stringParam(error, "additionalProperty") ?? "";
      return [{ kind, path: [...path, field], message: `unknown field "${field}"` }];
    }
    case "MissingField": {
      const field = stringParam(error, "missingProperty") ?? "";
      return [{ kind, path: [...path, field], message: `missing required field "${field}"` }];
    }
    case "EnumViolation": {
      const allowed: unknown = error.params.allowedValues;
      const options = Array.isArray(allowed) ? allowed.map(describeValue).join(", ") : "";
      return [{ kind, path, message: `${describeValue(error.data)} is not one of: ${options}` }];
    }
    case "DuplicateItem": {
      const items = valueAt(document, path);
      if (!Array.isArray(items)) {
        return [{ kind, path, message: fallbackMessage }];
      }
      return findDuplicateItems(items).map(({ index, duplicateOf }) => ({
        kind,
        path: [...path, index],
        message: `must NOT duplicate item ${duplicateOf}`,
      }));
    }
    default:
      return [{ kind, path, message: fallbackMessage }];
  }
}

// A wrong-typed value in an enumerated field also fails the enum; report it once.
function dropEnumBehindTypeMismatch(errors: ReviewError[]): ReviewError[] {
  const mistyped = new Set(errors.filter(e => e.kind === "TypeMismatch").map(e => JSON.stringify(e.path)));
  return errors.filter(e => e.kind !== "EnumViolation" || !mistyped.has(JSON.stringify(e.path)));
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class SopValidator {
  private readonly check: ValidateFunction<SopReviewDocument>;

  constructor(model: SchemaModel = sopSchema) {
    this.check = createAjv().compile<SopReviewDocument>(model.root);
  }

  /** Never throws for structural problems; all violations come back in `errors`. */
  validate(input: unknown): ValidationResult {
    if (this.check(input)) {
      return { valid: true, document: input, errors: [] };
    }
    const errors = (this.check.errors ?? []).flatMap(e => toReviewErrors(e, input));
    return { valid: false, errors: sortReviewErrors(dropEnumBehindTypeMismatch(errors)) };
  }
}

const defaultValidator = new SopValidator();

export function validateSopDocument(input: unknown): ValidationResult {
  return defaultValidator.validate(input);
}
