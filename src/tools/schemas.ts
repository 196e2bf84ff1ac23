import { z } from "zod";

// Archive tools schemas
export const UnpackDocxArgsSchema = z.object({
  archivePath: z.string().min(1),
  destinationDir: z.string().min(1),
});

export const PackDocxArgsSchema = z.object({
  directory: z.string().min(1),
  outputPath: z.string().min(1),
  force: z.boolean().optional(),
});

// Inspection tools schemas
export const FindPlaceholdersArgsSchema = z.object({
  directory: z.string().min(1),
  includeHeadersFooters: z.boolean().optional(),
  outputFile: z.string().optional(),
});

export const VerifyFillArgsSchema = z.object({
  directory: z.string().min(1),
  expectedFields: z.array(z.string()).default([]),
});

// Editing tools schemas
export const FillFieldsArgsSchema = z
  .object({
    directory: z.string().min(1),
    fieldMapping: z.record(z.string(), z.string()).optional(),
    mappingFile: z.string().optional(),
    includeHeadersFooters: z.boolean().optional(),
  })
  .refine((args) => args.fieldMapping !== undefined || args.mappingFile !== undefined, {
    message: "Provide fieldMapping or mappingFile",
    path: ["fieldMapping"],
  });

export const PlaceholderFieldSchema = z.object({
  fieldName: z.string().regex(/^[A-Za-z0-9_]+$/, "Use letters, digits and underscores only"),
  label: z.string().min(1),
  location: z.enum(["below_label", "inline"]).default("below_label"),
});

export const InsertPlaceholdersArgsSchema = z.object({
  directory: z.string().min(1),
  fields: z.array(PlaceholderFieldSchema).min(1),
});

export const FillTableArgsSchema = z.object({
  directory: z.string().min(1),
  tableIndex: z.number().int().min(0),
  rows: z.array(z.record(z.string(), z.string())).min(1),
});

// Extraction tools schemas
export const ExtractDataArgsSchema = z.object({
  directory: z.string().min(1),
  fieldNames: z.record(z.string(), z.string()).optional(),
});
