/**
 * Configuration – analyzer tuning and the field definition table
 */
import {
  DEFAULT_FIELD_DEFINITIONS,
  loadFieldDefinitions,
} from "../config/fieldDefinitions";
import {
  DEFAULT_ANALYZER_SETTINGS,
  resolveAnalyzerSettings,
} from "../config/options";
import type { AnalyzerTuning } from "../config/options";
import { ReceiptAnalyzer } from "../core/ReceiptAnalyzer";
import { ReceiptAnalysisError } from "../core/validator";

// ─── Analyzer settings ───────────────────────────────────────────────────────

describe("resolveAnalyzerSettings", () => {
  it("returns the defaults when nothing is tuned", () => {
    expect(resolveAnalyzerSettings()).toEqual({
      confidenceFloor: 0.3,
      rowResolution: 100,
      rowBand: 2,
      maxHorizontalGap: 0.6,
      rightEdgeTolerance: 0.01,
      coordinateOrigin: "top-left",
    });
    expect(DEFAULT_ANALYZER_SETTINGS).toEqual(resolveAnalyzerSettings());
  });

  it("merges tuning over the defaults", () => {
    const settings = resolveAnalyzerSettings({ rowBand: 4, confidenceFloor: 0.5 });
    expect(settings.rowBand).toBe(4);
    expect(settings.confidenceFloor).toBe(0.5);
    expect(settings.rowResolution).toBe(100);
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it("ignores analyzer options that are not tuning keys", () => {
    const analyzer = new ReceiptAnalyzer({ debug: false, rowBand: 3 });
    expect(analyzer.settings).toEqual({ ...DEFAULT_ANALYZER_SETTINGS, rowBand: 3 });
  });

  const invalid: Array<[AnalyzerTuning, string]> = [
    [{ confidenceFloor: 1.5 }, "confidenceFloor"],
    [{ rowResolution: 0 }, "rowResolution"],
    [{ rowBand: 1.5 }, "rowBand"],
    [{ maxHorizontalGap: 0 }, "maxHorizontalGap"],
  ];

  it.each(invalid)("rejects %o", (tuning, key) => {
    try {
      resolveAnalyzerSettings(tuning);
      throw new Error("expected resolveAnalyzerSettings() to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(ReceiptAnalysisError);
      expect(err).toMatchObject({ code: "INVALID_OPTIONS" });
      expect(String(err)).toContain(`Invalid analyzer options: ${key}:`);
    }
  });
});

// ─── Field definitions ───────────────────────────────────────────────────────

describe("DEFAULT_FIELD_DEFINITIONS", () => {
  it("loads the bundled table", () => {
    expect(DEFAULT_FIELD_DEFINITIONS.version).toBe("2025.12.2");
    expect(DEFAULT_FIELD_DEFINITIONS.fields).toHaveLength(26);
    expect(DEFAULT_FIELD_DEFINITIONS.fields[0]?.key).toBe("projectId");
  });

  it("is deeply frozen", () => {
    expect(Object.isFrozen(DEFAULT_FIELD_DEFINITIONS)).toBe(true);
    expect(Object.isFrozen(DEFAULT_FIELD_DEFINITIONS.fields)).toBe(true);
    expect(Object.isFrozen(DEFAULT_FIELD_DEFINITIONS.fields[0])).toBe(true);
    expect(Object.isFrozen(DEFAULT_FIELD_DEFINITIONS.fields[0]?.aliases)).toBe(true);
  });

  it("declares amount, quantity and unit price as numeric", () => {
    const kinds = Object.fromEntries(
      DEFAULT_FIELD_DEFINITIONS.fields.map((f) => [f.key, f.kind]),
    );
    expect(kinds.amount).toBe("numeric");
    expect(kinds.quantity).toBe("numeric");
    expect(kinds.unitPrice).toBe("numeric");
    expect(kinds.date).toBe("date");
  });
});

describe("loadFieldDefinitions", () => {
  it("rejects duplicate keys", () => {
    expect(() =>
      loadFieldDefinitions({
        version: "x",
        fields: [
          { key: "a", kind: "text", aliases: ["foo"] },
          { key: "a", kind: "text", aliases: ["bar"] },
        ],
      }),
    ).toThrow("Invalid field definition table: fields.1.key: duplicate field key 'a'");
  });

  it("rejects aliases that are not lower-case", () => {
    expect(() =>
      loadFieldDefinitions({
        version: "x",
        fields: [{ key: "a", kind: "text", aliases: ["Foo"] }],
      }),
    ).toThrow("fields.0.aliases.0: aliases must be trimmed lower-case text");
  });

  it("rejects a field without aliases", () => {
    expect(() =>
      loadFieldDefinitions({
        version: "x",
        fields: [{ key: "a", kind: "text", aliases: [] }],
      }),
    ).toThrow(ReceiptAnalysisError);
  });

  it("rejects non-object input", () => {
    expect(() => loadFieldDefinitions("fields")).toThrow(
      /^Invalid field definition table: \(root\): /,
    );
  });

  it("surfaces table errors from the analyzer constructor", () => {
    expect(
      () => new ReceiptAnalyzer({ fieldDefinitions: { version: "x", fields: [] } }),
    ).toThrow(ReceiptAnalysisError);
  });
});
