import { z } from "zod";

/**
 * ReportProfileV1
 *
 * Presentation settings for the volume report. Column widths and number formats are
 * fixed by the renderer; a profile only names the title and the volume unit label.
 */
export const ReportProfileV1Z = z
  .object({
    type: z.literal("report_profile_v1"),
    schema_version: z.string().regex(/^\d+\.\d+\.\d+$/),
    title: z.string().min(1).max(120),
    volume_unit: z.string().min(1).max(8)
  })
  .strict();

export type ReportProfileV1 = z.infer<typeof ReportProfileV1Z>;

export const ReportProfileNameZ = z.string().regex(/^[A-Za-z0-9_-]+$/, "profile name must match [A-Za-z0-9_-]+");

export function parseReportProfileV1(input: unknown): ReportProfileV1 {
  return ReportProfileV1Z.parse(input);
}
