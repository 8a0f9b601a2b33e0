/**
 * FieldMatcher – label detection against the alias table
 */
import { DEFAULT_FIELD_DEFINITIONS, loadFieldDefinitions } from "../config/fieldDefinitions";
import { FieldMatcher } from "../parser/FieldMatcher";

const none = (): boolean => false;

describe("FieldMatcher.match", () => {
  const matcher = new FieldMatcher(DEFAULT_FIELD_DEFINITIONS);

  it("reports the longest alias of the matched field", () => {
    const match = matcher.match("total amount", none);
    expect(match?.field.key).toBe("amount");
    expect(match?.alias).toBe("total amount");
    expect(match?.aliasEnd).toBe(12);
  });

  it("finds short aliases inside a split label", () => {
    const match = matcher.match("qty - 5", none);
    expect(match?.field.key).toBe("quantity");
    expect(match?.alias).toBe("qty");
    expect(match?.aliasEnd).toBe(3);
  });

  it("prefers earlier fields in table order", () => {
    expect(matcher.match("unit price", none)?.field.key).toBe("unitPrice");
    expect(matcher.match("remarks", none)?.field.key).toBe("description");
    expect(matcher.match("item type", none)?.field.key).toBe("itemType");
  });

  it("skips fields that are already resolved", () => {
    expect(matcher.match("total amount", (key) => key === "amount")).toBeUndefined();
    expect(
      matcher.match("unit price", (key) => key === "unitPrice")?.field.key,
    ).toBe("uom");
  });

  it("returns undefined for plain values", () => {
    expect(matcher.match("ambuja", none)).toBeUndefined();
    expect(matcher.match("450.00", none)).toBeUndefined();
  });

  it("measures aliasEnd from where the alias occurs", () => {
    const custom = new FieldMatcher(
      loadFieldDefinitions({
        version: "test",
        fields: [{ key: "a", kind: "text", aliases: ["foo", "foo bar"] }],
      }),
    );
    const match = custom.match("x foo bar y", none);
    expect(match?.alias).toBe("foo bar");
    expect(match?.aliasEnd).toBe(9);
  });
});

describe("FieldMatcher.looksLikeLabel", () => {
  const matcher = new FieldMatcher(DEFAULT_FIELD_DEFINITIONS);

  it("accepts text opening with an alias", () => {
    expect(matcher.looksLikeLabel("rate")).toBe(true);
    expect(matcher.looksLikeLabel("  qty:")).toBe(true);
    expect(matcher.looksLikeLabel("total amount")).toBe(true);
  });

  it("rejects values that merely contain an alias", () => {
    expect(matcher.looksLikeLabel("raw materials")).toBe(false);
    expect(matcher.looksLikeLabel("cement for slab")).toBe(false);
    expect(matcher.looksLikeLabel("₹ 400")).toBe(false);
  });
});
