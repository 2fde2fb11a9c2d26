import { z } from "zod";

const lowercased = (value: unknown): unknown => (typeof value === "string" ? value.trim().toLowerCase() : value);

// Unrecognised severities become "low".
const SeveritySchema = z.preprocess(lowercased, z.enum(["low", "medium", "high"]).default("low")).catch("low");

export const ComparisonQualityIssueSchema = z.object({
  issue_type: z.string().default("general"),
  severity: SeveritySchema,
  description: z.string().default(""),
  suggestion: z.string().default(""),
});

export const ComparisonPayloadSchema = z.object({
  similarity_percentage: z.number().int().min(0).max(100).default(0),
  refactoring_level: z.preprocess(
    lowercased,
    z.enum(["none", "low", "medium", "high", "unknown"]).default("unknown"),
  ),
  added_features: z.boolean().default(false),
  removed_features: z.boolean().default(false),
  notes: z.string().default("No analysis available"),
  quality_issues: z.array(ComparisonQualityIssueSchema).default([]),
});

export const QualityIssueSchema = z.object({
  type: z.string().default("general"),
  severity: SeveritySchema,
  description: z.string().default(""),
  recommendation: z.string().default(""),
  tool_missed: z.boolean().default(false),
});

export const QualityPayloadSchema = z.object({
  issues: z.array(QualityIssueSchema).default([]),
});

export type ComparisonPayload = z.infer<typeof ComparisonPayloadSchema>;
export type QualityPayload = z.infer<typeof QualityPayloadSchema>;
