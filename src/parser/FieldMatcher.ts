/**
 * ReceiptLens – Label detection against the field alias table
 */

import type { FieldDefinition, FieldDefinitionTable } from "../types";

export interface LabelMatch {
  field: FieldDefinition;
  alias: string;
  /** Offset in the lower-cased text just past the alias */
  aliasEnd: number;
}

export class FieldMatcher {
  private readonly allAliases: readonly string[];

  constructor(private readonly table: FieldDefinitionTable) {
    this.allAliases = table.fields.flatMap((f) => f.aliases);
  }

  /**
   * First field in table order, not yet resolved, with an alias contained
   * in `lower`. Within that field the longest contained alias is reported.
   */
  match(
    lower: string,
    isResolved: (key: string) => boolean,
  ): LabelMatch | undefined {
    for (const field of this.table.fields) {
      if (isResolved(field.key)) continue;

      let best: LabelMatch | undefined;
      for (const alias of field.aliases) {
        const at = lower.indexOf(alias);
        if (at < 0) continue;
        if (!best || alias.length > best.alias.length) {
          best = { field, alias, aliasEnd: at + alias.length };
        }
      }
      if (best) return best;
    }
    return undefined;
  }

  /**
   * Whether the text opens with an alias ("Rate", "Total Amount", "Qty:").
   * Header cells read this way; values such as "Raw Materials" do not.
   */
  looksLikeLabel(lower: string): boolean {
    const head = lower.replace(/^[^a-z]+/, "");
    return this.allAliases.some((alias) => head.startsWith(alias));
  }
}
