import type { SopReviewDocument } from "@shared/schema";

/** Smallest valid payload: every required table present, all of them empty. */
export function minimalPayload(): SopReviewDocument {
  return {
    step1: {
      project_name: "X",
      round_version: "1.0",
      regions_in_scope: ["USA"],
      due_date: "2025-01-01",
    },
    step2: {
      files: [
        { type: "Copy Document", filename: "copy.docx", status_code: "OK" },
        { type: "Artwork", filename: "art.pdf", status_code: "OK" },
      ],
    },
    step3: {
      copy_quality: [],
      claim_risk: [],
      label_claim_conversion: [],
      artwork_match: [],
      font_size: [],
      barcode: [],
      visual_snapshots: [],
      score_summary: { summary_rows: [], top_fixes: [], attention: [], next_steps: [] },
    },
    step5: { constraints: [] },
  };
}

/** One row in every table, optional step4 included. */
export function fullPayload(): SopReviewDocument {
  return {
    version: "1.2.0",
    step1: {
      project_name: "Citrus Shampoo",
      round_version: "R2",
      regions_in_scope: ["USA", "EU", "Other"],
      due_date: "TBD",
    },
    step2: {
      files: [
        { type: "Copy Document", filename: "copy-v2.docx", status_code: "OK", note: "latest" },
        { type: "Artwork", filename: "front.pdf", status_code: "ATTN" },
        { type: "Other", filename: "brief.txt", status_code: "FYI" },
      ],
    },
    step3: {
      copy_quality: [
        { language: "EN", original_text: "Gentle clense", recommendation: "Gentle cleanse", status_code: "FAIL", evidence: "panel 1" },
      ],
      claim_risk: [
        {
          language: "FR",
          claim: "Clinically proven",
          risk_level: "High",
          rationale: "needs study",
          regions_impacted: ["EU", "CA"],
          action: "Modify",
          status_code: "ATTN",
        },
      ],
      label_claim_conversion: [
        {
          source: "front panel",
          declared_ml: 250,
          calculated_fl_oz: 8.45,
          declared_fl_oz: 8.4,
          within_tolerance: true,
          status_code: "OK",
          notes: "",
        },
      ],
      artwork_match: [
        { field: "Net contents", copy_doc_value: "250 mL", artwork_value: "250 ml", match: false, notes: "case" },
      ],
      font_size: [
        {
          text: "Net contents",
          jurisdiction: "US",
          required_min_pt: 6,
          measured_min_pt: 5.5,
          method: "Vector",
          status_code: "FAIL",
          screenshot_id: "G-001",
        },
      ],
      barcode: [
        {
          symbology: "UPC-A",
          encoded_digits: "012345678905",
          check_digit_valid: true,
          x_dim_mm: 0.33,
          quiet_zone_mm: 2.5,
          module_count: 95,
          print_contrast: 80,
          scan_test: "Pass",
        },
      ],
      visual_snapshots: [
        {
          id: "G-001",
          what: "Small type",
          where: "back panel",
          fix: "Enlarge to 6pt",
          linked_rows: ["E1", "D1"],
          status_after_fix: "TBD",
        },
      ],
      score_summary: {
        summary_rows: [{ area: "Copy", checks: 4, matches: 3, score_percent: 75, notes: "one typo" }],
        top_fixes: ["Fix typo"],
        attention: ["Claim wording"],
        next_steps: ["Send R3"],
      },
    },
    step4: {
      version_change_log: "R1 -> R2",
      one_page_pdf_summary_export: false,
    },
    step5: {
      constraints: [
        { constraint: "No medical claims", source: "Regulatory", applies_to: "EU / front", notes: "" },
      ],
    },
  };
}
