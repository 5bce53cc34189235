// Typed view of a review payload. These records only describe a document that has
// already passed validation against server/schemas/sop.artwork-review.schema.json;
// the enum lists below mirror the $defs in that file.

// ============== ENUMERATIONS ==============
export const regionEnum = ["USA", "EU", "UK", "CA", "AU", "Other"] as const;
export type Region = typeof regionEnum[number];

export const languageEnum = ["EN", "FR", "ES", "DE", "IT", "PT", "NL", "Other"] as const;
export type Language = typeof languageEnum[number];

export const statusEnum = ["OK", "ATTN", "FAIL", "TBD", "FYI"] as const;
export type StatusCode = typeof statusEnum[number];

export const riskLevelEnum = ["Low", "Medium", "High", "Prohibited"] as const;
export type RiskLevel = typeof riskLevelEnum[number];

export const actionEnum = ["Keep", "Modify", "Remove", "Escalate"] as const;
export type ClaimAction = typeof actionEnum[number];

export const methodEnum = ["Bitmap", "Vector", "OCR", "Manual"] as const;
export type VerificationMethod = typeof methodEnum[number];

export const symbologyEnum = ["UPC-A", "EAN-13", "Code128", "QR", "DataMatrix", "Other"] as const;
export type Symbology = typeof symbologyEnum[number];

export const fileTypeEnum = ["Copy Document", "Artwork", "Other"] as const;
export type FileType = typeof fileTypeEnum[number];

export const scanTestEnum = ["Pass", "Fail", "N/A"] as const;
export type ScanTestResult = typeof scanTestEnum[number];

export const snapshotStatusEnum = ["TBD", "Resolved", "Rejected"] as const;
export type SnapshotStatus = typeof snapshotStatusEnum[number];

export const constraintSourceEnum = ["Retailer", "Regulatory", "Brand", "Legal", "Other"] as const;
export type ConstraintSource = typeof constraintSourceEnum[number];

// ============== STEP 1: PROJECT HEADER ==============
export interface ProjectHeader {
  project_name: string;
  round_version: string;
  regions_in_scope: Region[];
  /** "TBD" or YYYY-MM-DD */
  due_date: string;
}

// ============== STEP 2: FILES TO ATTACH ==============
export interface FileItem {
  type: FileType;
  filename: string;
  status_code: StatusCode;
  note?: string;
}

export interface FilesToAttach {
  files: FileItem[];
}

// ============== STEP 3: CORE VERIFICATION TABLES ==============
export interface CopyQualityRow {
  language: Language;
  original_text: string;
  recommendation: string;
  status_code: StatusCode;
  evidence: string;
}

export interface ClaimRiskRow {
  language: Language;
  claim: string;
  risk_level: RiskLevel;
  rationale: string;
  regions_impacted: Region[];
  action: ClaimAction;
  status_code: StatusCode;
}

export interface LabelClaimConversionRow {
  source: string;
  declared_ml: number;
  calculated_fl_oz: number;
  declared_fl_oz: number;
  within_tolerance: boolean;
  status_code: StatusCode;
  notes: string;
}

export interface ArtworkMatchRow {
  field: string;
  copy_doc_value: string;
  artwork_value: string;
  match: boolean;
  notes: string;
}

export interface FontSizeRow {
  text: string;
  jurisdiction: string;
  required_min_pt: number;
  measured_min_pt: number;
  method: VerificationMethod;
  status_code: StatusCode;
  screenshot_id: string;
}

export interface BarcodeRow {
  symbology: Symbology;
  encoded_digits: string;
  check_digit_valid: boolean;
  x_dim_mm: number;
  quiet_zone_mm: number;
  module_count: number;
  print_contrast: number;
  scan_test: ScanTestResult;
}

export interface VisualSnapshotRow {
  /** G-### */
  id: string;
  what: string;
  where: string;
  fix: string;
  linked_rows: string[];
  status_after_fix: SnapshotStatus;
}

export interface ScoreSummaryRow {
  area: string;
  checks: number;
  matches: number;
  score_percent: number;
  notes: string;
}

export interface ScoreSummary {
  summary_rows: ScoreSummaryRow[];
  top_fixes: string[];
  attention: string[];
  next_steps: string[];
}

export interface VerificationTables {
  copy_quality: CopyQualityRow[];
  claim_risk: ClaimRiskRow[];
  label_claim_conversion: LabelClaimConversionRow[];
  artwork_match: ArtworkMatchRow[];
  font_size: FontSizeRow[];
  barcode: BarcodeRow[];
  visual_snapshots: VisualSnapshotRow[];
  score_summary: ScoreSummary;
}

export type VerificationTableKey = keyof VerificationTables;

// ============== STEP 4: OPTIONAL FIELDS ==============
export interface OptionalFields {
  version_change_log?: string;
  creative_brand_voice_check?: string;
  one_page_pdf_summary_export?: boolean;
}

export type OptionalFieldKey = keyof OptionalFields;

// ============== STEP 5: SPECIAL NOTES / CONSTRAINTS ==============
export interface ConstraintRow {
  constraint: string;
  source: ConstraintSource;
  applies_to: string;
  notes: string;
}

export interface SpecialNotes {
  constraints: ConstraintRow[];
}

// ============== DOCUMENT ==============
export interface SopReviewDocument {
  version?: string;
  step1: ProjectHeader;
  step2: FilesToAttach;
  step3: VerificationTables;
  step4?: OptionalFields;
  step5: SpecialNotes;
}
