/**
 * Job Validation Schemas
 * Zod schemas for validating job requests.
 */

import { z } from "zod";

export const submitJobSchema = z.object({
  // Content is checked by the pipeline so a bad URL is still recorded as a failed job
  url: z.string(),
});

export type SubmitJobBody = z.infer<typeof submitJobSchema>;
