/**
 * ReceiptLens – Field definition table
 *
 * The alias table is a versioned JSON artefact. It is validated and
 * deep-frozen once when this module loads; analyzers share it by reference.
 */

import { z } from "zod";

import type { FieldDefinition, FieldDefinitionTable } from "../types";
import { ReceiptAnalysisError } from "../core/validator";
import bundledTable from "./fieldDefinitions.json";

const aliasSchema = z
  .string()
  .min(1)
  .refine((a) => a === a.trim().toLowerCase(), {
    message: "aliases must be trimmed lower-case text",
  });

const fieldDefinitionSchema = z.object({
  key: z.string().regex(/^[A-Za-z][A-Za-z0-9_]*$/, "invalid field key"),
  kind: z.enum(["text", "numeric", "date"]),
  aliases: z.array(aliasSchema).min(1),
});

export const fieldDefinitionTableSchema = z
  .object({
    version: z.string().min(1),
    fields: z.array(fieldDefinitionSchema).min(1),
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    table.fields.forEach((field, i) => {
      if (seen.has(field.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fields", i, "key"],
          message: `duplicate field key '${field.key}'`,
        });
      }
      seen.add(field.key);
    });
  });

/**
 * Validate an alias table and return a frozen copy.
 *
 * @throws ReceiptAnalysisError INVALID_OPTIONS when the table is malformed
 */
export function loadFieldDefinitions(source: unknown): FieldDefinitionTable {
  const parsed = fieldDefinitionTableSchema.safeParse(source);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ReceiptAnalysisError(
      `Invalid field definition table: ${detail}`,
      "INVALID_OPTIONS",
      parsed.error,
    );
  }

  const fields: FieldDefinition[] = parsed.data.fields.map((f) =>
    Object.freeze({
      key: f.key,
      kind: f.kind,
      aliases: Object.freeze([...f.aliases]),
    }),
  );

  return Object.freeze({
    version: parsed.data.version,
    fields: Object.freeze(fields),
  });
}

/** Table shipped with the package */
export const DEFAULT_FIELD_DEFINITIONS: FieldDefinitionTable =
  loadFieldDefinitions(bundledTable);
