import { z } from "zod";

export const catalogRecordSchema = z.object({
  prefix: z.string(),
  number: z.string(),
  title: z.string(),
  description: z.string(),
  units: z.string(),
  department: z.string(),
  institution_id: z.number().int(),
  metadata: z.string(),
});

export const runMetadataSchema = z.object({
  sourceId: z.string(),
  totalUnits: z.number().int().nonnegative(),
  unitsProcessed: z.number().int().nonnegative(),
  recordCount: z.number().int().nonnegative(),
  timestamp: z.string(),
  status: z.enum(["in_progress", "complete"]),
  strategy: z.string().optional(),
  runId: z.string().optional(),
});

export const checkpointArtifactSchema = z.object({
  metadata: runMetadataSchema,
  records: z.array(catalogRecordSchema),
});
