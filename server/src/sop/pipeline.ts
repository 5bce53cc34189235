/**
 * SOP REVIEW PIPELINE
 *
 * parse -> validate -> render. Outer surfaces (CLI, HTTP) call into here and
 * decide how each outcome is surfaced; nothing in this module does I/O.
 */

import type { SopReviewDocument } from "@shared/schema";
import { MalformedInputError, ReviewValidationError, type ReviewError } from "./errors";
import { renderSopReport, type RenderOptions } from "./render/renderSopMarkdown";
import { validateSopDocument } from "./validator";

export type ReviewOutcome =
  | { status: "malformed"; message: string }
  | { status: "invalid"; errors: ReviewError[] }
  | { status: "rendered"; document: SopReviewDocument; markdown: string };

export function parseReviewPayload(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new MalformedInputError(`Failed to read JSON payload: ${detail}`, detail);
  }
}

/** Validates an already-parsed value and renders it, or throws ReviewValidationError. */
export function renderValidatedReport(value: unknown, options: Partial<RenderOptions> = {}): string {
  const result = validateSopDocument(value);
  if (!result.valid) {
    throw new ReviewValidationError(result.errors);
  }
  return renderSopReport(result.document, options);
}

export function processReviewPayload(text: string, options: Partial<RenderOptions> = {}): ReviewOutcome {
  let value: unknown;
  try {
    value = parseReviewPayload(text);
  } catch (e) {
    if (e instanceof MalformedInputError) {
      return { status: "malformed", message: e.message };
    }
    throw e;
  }

  const result = validateSopDocument(value);
  if (!result.valid) {
    return { status: "invalid", errors: result.errors };
  }
  return { status: "rendered", document: result.document, markdown: renderSopReport(result.document, options) };
}
