/**
 * Import request schemas
 * - ImportRowsRequestSchema: a decoded table posted as JSON
 * - ImportFormSchema: the text fields that accompany a multipart .xlsx upload
 */

import { z } from "zod";

export const IMPORT_MODES = ["replace", "merge"] as const;

const importSettings = {
  mode: z.enum(IMPORT_MODES).default("merge"),
  category: z.string().trim().optional(),
  mergeExisting: z.enum(["overwrite", "skip"]).optional(),
  rowPolicy: z.enum(["lenient", "strict"]).optional(),
};

const cellValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ImportRowsRequestSchema = z
  .object({
    ...importSettings,
    headers: z.array(z.string()).optional(),
    rows: z.array(z.record(cellValue)).max(50_000, "At most 50000 rows per import"),
  })
  .transform(({ headers, rows, ...settings }) => ({
    ...settings,
    rows,
    // Without explicit headers, the keys of the first row are the columns
    headers: headers ?? Object.keys(rows[0] ?? {}),
  }));

export const ImportFormSchema = z.object({
  ...importSettings,
  // Form fields arrive as strings; an empty category means "not selected"
  category: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
});

export type ImportRowsRequest = z.infer<typeof ImportRowsRequestSchema>;
export type ImportForm = z.infer<typeof ImportFormSchema>;
