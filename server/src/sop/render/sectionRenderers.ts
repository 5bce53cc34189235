/**
 * SECTION RENDERERS
 *
 * One function per document section, each turning validated section data into
 * table artifacts. Column order is fixed per table; sub-tables and optional
 * fields follow the property order declared in the schema model.
 *
 * No checks happen here: input is assumed to have passed validation.
 */

import type {
  ArtworkMatchRow,
  BarcodeRow,
  ClaimRiskRow,
  CopyQualityRow,
  FilesToAttach,
  FontSizeRow,
  LabelClaimConversionRow,
  OptionalFieldKey,
  OptionalFields,
  ProjectHeader,
  ScoreSummary,
  SpecialNotes,
  VerificationTableKey,
  VerificationTables,
  VisualSnapshotRow,
} from "@shared/schema";
import { checkMark, formatRegionList, statusSymbol, yesNo } from "../normalize";
import { sopSchema } from "../schemaModel";
import type { TableArtifact } from "../tableRenderer";

export const SECTION_TITLES = {
  step1: "1️⃣ Project Header",
  step2: "2️⃣ Files to Attach",
  step4: "4️⃣ Optional Fields",
  step5: "5️⃣ Special Notes / Constraints",
} as const;

export const VERIFICATION_TITLES: Record<VerificationTableKey, string> = {
  copy_quality: "A. Copy Quality",
  claim_risk: "B. Claim Risk",
  label_claim_conversion: "C. Label-Claim Conversion",
  artwork_match: "D. Artwork Match",
  font_size: "E. Font Size",
  barcode: "F. Barcode",
  visual_snapshots: "G. Visual Snapshots",
  score_summary: "H. Score & Summary",
};

export const SCORE_LIST_TITLES = {
  top_fixes: "Top Fixes (❌)",
  attention: "Attention (⚠️)",
  next_steps: "Next Steps",
} as const;

const OPTIONAL_FIELD_LABELS: Record<OptionalFieldKey, string> = {
  version_change_log: "Version-Change Log",
  creative_brand_voice_check: "Creative Brand-Voice Check",
  one_page_pdf_summary_export: "One-Page PDF Summary Export",
};

// ============================================================================
// STEP 1 & 2
// ============================================================================

export function renderProjectHeader(step: ProjectHeader): TableArtifact {
  return {
    title: SECTION_TITLES.step1,
    header: ["Field", "Fill In"],
    rows: [
      ["Project Name", step.project_name],
      ["Round / Version", step.round_version],
      ["Regions in Scope", formatRegionList(step.regions_in_scope)],
      ["Due Date", step.due_date],
    ],
  };
}

export function renderFilesToAttach(step: FilesToAttach): TableArtifact {
  return {
    title: SECTION_TITLES.step2,
    header: ["Type", "Filename", "Status", "Note"],
    rows: step.files.map(f => [f.type, f.filename, statusSymbol(f.status_code), f.note ?? ""]),
  };
}

// ============================================================================
// STEP 3 (A–H)
// ============================================================================

export function renderCopyQuality(items: CopyQualityRow[]): TableArtifact {
  return {
    title: VERIFICATION_TITLES.copy_quality,
    header: ["Language", "Original Text", "Recommendation", "Status", "Evidence"],
    rows: items.map(x => [x.language, x.original_text, x.recommendation, statusSymbol(x.status_code), x.evidence]),
  };
}

export function renderClaimRisk(items: ClaimRiskRow[]): TableArtifact {
  return {
    title: VERIFICATION_TITLES.claim_risk,
    header: ["Language", "Claim (quote)", "Risk Level", "Rationale", "Regions", "Action", "Status"],
    rows: items.map(x => [
      x.language,
      x.claim,
      x.risk_level,
      x.rationale,
      x.regions_impacted.join(", "),
      x.action,
      statusSymbol(x.status_code),
    ]),
  };
}

export function renderLabelClaimConversion(items: LabelClaimConversionRow[]): TableArtifact {
  return {
    title: VERIFICATION_TITLES.label_claim_conversion,
    header: ["Source", "Declared (mL)", "Calculated (fl oz)", "Declared (fl oz)", "Within ±0.10", "Status", "Notes"],
    rows: items.map(x => [
      x.source,
      x.declared_ml,
      x.calculated_fl_oz,
      x.declared_fl_oz,
      yesNo(x.within_tolerance),
      statusSymbol(x.status_code),
      x.notes,
    ]),
  };
}

export function renderArtworkMatch(items: ArtworkMatchRow[]): TableArtifact {
  return {
    title: VERIFICATION_TITLES.artwork_match,
    header: ["Field", "Copy Doc Value", "Artwork Value", "Match", "Notes"],
    rows: items.map(x => [x.field, x.copy_doc_value, x.artwork_value, checkMark(x.match), x.notes]),
  };
}

export function renderFontSize(items: FontSizeRow[]): TableArtifact {
  return {
    title: VERIFICATION_TITLES.font_size,
    header: ["Text String / Field", "Jurisdiction", "Required Min (pt)", "Measured Min (pt)", "Method", "Status", "Screenshot ID"],
    rows: items.map(x => [
      x.text,
      x.jurisdiction,
      x.required_min_pt,
      x.measured_min_pt,
      x.method,
      statusSymbol(x.status_code),
      x.screenshot_id,
    ]),
  };
}

export function renderBarcode(items: BarcodeRow[]): TableArtifact {
  return {
    title: VERIFICATION_TITLES.barcode,
    header: ["Symbology", "Encoded Digits", "Check Digit Valid", "X-Dim (mm)", "Quiet Zone (mm)", "Module Count", "Print Contrast", "Scan Test"],
    rows: items.map(x => [
      x.symbology,
      x.encoded_digits,
      yesNo(x.check_digit_valid),
      x.x_dim_mm,
      x.quiet_zone_mm,
      x.module_count,
      x.print_contrast,
      x.scan_test,
    ]),
  };
}

export function renderVisualSnapshots(items: VisualSnapshotRow[]): TableArtifact {
  return {
    title: VERIFICATION_TITLES.visual_snapshots,
    header: ["ID", "What", "Where", "Fix", "Linked Rows", "Status After Fix"],
    rows: items.map(x => [x.id, x.what, x.where, x.fix, x.linked_rows.join(", "), x.status_after_fix]),
  };
}

function renderItemList(title: string, items: string[]): TableArtifact {
  return { title, header: ["Item"], rows: items.map(item => [item]) };
}

/** Score table, then the failing, warning and next-step lists. */
export function renderScoreSummary(summary: ScoreSummary): TableArtifact[] {
  return [
    {
      title: VERIFICATION_TITLES.score_summary,
      header: ["Area", "Checks", "Matches", "Score %", "Notes"],
      rows: summary.summary_rows.map(x => [x.area, x.checks, x.matches, x.score_percent, x.notes]),
    },
    renderItemList(SCORE_LIST_TITLES.top_fixes, summary.top_fixes),
    renderItemList(SCORE_LIST_TITLES.attention, summary.attention),
    renderItemList(SCORE_LIST_TITLES.next_steps, summary.next_steps),
  ];
}

type VerificationRenderers = {
  [K in VerificationTableKey]: (value: VerificationTables[K]) => TableArtifact[];
};

const VERIFICATION_RENDERERS: VerificationRenderers = {
  copy_quality: items => [renderCopyQuality(items)],
  claim_risk: items => [renderClaimRisk(items)],
  label_claim_conversion: items => [renderLabelClaimConversion(items)],
  artwork_match: items => [renderArtworkMatch(items)],
  font_size: items => [renderFontSize(items)],
  barcode: items => [renderBarcode(items)],
  visual_snapshots: items => [renderVisualSnapshots(items)],
  score_summary: renderScoreSummary,
};

function isVerificationTableKey(key: string): key is VerificationTableKey {
  return Object.hasOwn(VERIFICATION_RENDERERS, key);
}

function renderVerificationTable<K extends VerificationTableKey>(key: K, tables: VerificationTables): TableArtifact[] {
  const render: (value: VerificationTables[K]) => TableArtifact[] = VERIFICATION_RENDERERS[key];
  return render(tables[key]);
}

export function renderVerificationTables(step: VerificationTables): TableArtifact[] {
  return sopSchema
    .propertyOrder(["step3"])
    .filter(isVerificationTableKey)
    .flatMap(key => renderVerificationTable(key, step));
}

// ============================================================================
// STEP 4 & 5
// ============================================================================

function isOptionalFieldKey(key: string): key is OptionalFieldKey {
  return Object.hasOwn(OPTIONAL_FIELD_LABELS, key);
}

/** Only fields that are present get a row. */
export function renderOptionalFields(step: OptionalFields): TableArtifact {
  const rows: string[][] = [];
  for (const key of sopSchema.propertyOrder(["step4"]).filter(isOptionalFieldKey)) {
    const value = step[key];
    if (value === undefined) continue;
    rows.push([OPTIONAL_FIELD_LABELS[key], typeof value === "boolean" ? yesNo(value) : value]);
  }
  return { title: SECTION_TITLES.step4, header: ["Field", "Content"], rows };
}

export function renderSpecialNotes(step: SpecialNotes): TableArtifact {
  return {
    title: SECTION_TITLES.step5,
    header: ["Constraint", "Source", "Applies To (Region/Panel)", "Notes"],
    rows: step.constraints.map(x => [x.constraint, x.source, x.applies_to, x.notes]),
  };
}
