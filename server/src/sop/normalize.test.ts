import { describe, it, expect } from "vitest";
import {
  canonicalRegionKey,
  checkMark,
  formatRegion,
  formatRegionList,
  regionFlag,
  REGION_FALLBACK_FLAG,
  REGION_FLAGS,
  statusSymbol,
  yesNo,
} from "./normalize";

describe("value normalization", () => {
  it("maps each status code to its display symbol", () => {
    expect(statusSymbol("OK")).toBe("✅");
    expect(statusSymbol("ATTN")).toBe("⚠️");
    expect(statusSymbol("FAIL")).toBe("❌");
    expect(statusSymbol("TBD")).toBe("TBD");
    expect(statusSymbol("FYI")).toBe("FYI");
  });

  it("renders booleans", () => {
    expect(yesNo(true)).toBe("Yes");
    expect(yesNo(false)).toBe("No");
    expect(checkMark(true)).toBe("✅");
    expect(checkMark(false)).toBe("❌");
  });

  describe("regions", () => {
    it.each(["USA", "usa", "US", "U.S.", "u.s.a.", " United States "])("resolves %j to the USA flag", label => {
      expect(regionFlag(label)).toBe(REGION_FLAGS.USA);
    });

    it.each([
      ["GB", "UK"],
      ["Great Britain", "UK"],
      ["united kingdom", "UK"],
      ["European Union", "EU"],
      ["Canada", "CA"],
      ["Australia", "AU"],
      ["other", "OTHER"],
    ])("canonicalizes %j to %s", (label, key) => {
      expect(canonicalRegionKey(label)).toBe(key);
    });

    it("is idempotent", () => {
      for (const label of ["U.S.", "gb", " Canada", "Mars"]) {
        const once = canonicalRegionKey(label);
        expect(canonicalRegionKey(once)).toBe(once);
      }
    });

    it("falls back to the globe for unknown labels", () => {
      expect(regionFlag("MARS")).toBe(REGION_FALLBACK_FLAG);
      expect(formatRegion("MARS")).toBe("🌐 MARS");
    });

    it("keeps the supplied label text", () => {
      expect(formatRegion("U.S.")).toBe("🇺🇸 U.S.");
      expect(formatRegion(" US ")).toBe("🇺🇸  US");
    });

    it("joins a list in order", () => {
      expect(formatRegionList(["EU", "USA", "Other"])).toBe("🇪🇺 EU, 🇺🇸 USA, 🌐 Other");
      expect(formatRegionList([])).toBe("");
    });
  });
});
