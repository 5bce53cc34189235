/**
 * SOP MARKDOWN REPORT
 *
 * Rules:
 * - Sections in document order: step1, step2, step3 (A–H), step4 if present, step5
 * - One blank line between tables, one trailing newline
 * - Same document in, same bytes out
 */

import type { SopReviewDocument } from "@shared/schema";
import { renderTable, type TableArtifact, type TableRenderOptions } from "../tableRenderer";
import {
  renderFilesToAttach,
  renderOptionalFields,
  renderProjectHeader,
  renderSpecialNotes,
  renderVerificationTables,
} from "./sectionRenderers";

export type RenderOptions = TableRenderOptions;

export function collectReportTables(document: SopReviewDocument): TableArtifact[] {
  const tables: TableArtifact[] = [];
  tables.push(renderProjectHeader(document.step1));
  tables.push(renderFilesToAttach(document.step2));
  tables.push(...renderVerificationTables(document.step3));
  if (document.step4 !== undefined) {
    tables.push(renderOptionalFields(document.step4));
  }
  tables.push(renderSpecialNotes(document.step5));
  return tables;
}

export function renderSopReport(document: SopReviewDocument, options: Partial<RenderOptions> = {}): string {
  const blocks = collectReportTables(document).map(table => renderTable(table, options));
  return blocks.join("\n\n") + "\n";
}
