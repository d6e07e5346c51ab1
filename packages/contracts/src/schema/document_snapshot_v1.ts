import { z } from "zod"; // zod: runtime admission for host snapshots

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/); // schema_version is SemVer, never free text

const RecordIdZ = z.string().min(1);

/**
 * One per-station-range cut/fill record.
 *
 * stationStart <= stationEnd is NOT checked here: the authoring application owns it,
 * and an inverted range is carried through to the report unchanged.
 */
export const QuantityRecordV1Z = z
  .object({
    stationStart: z.number().finite(),
    stationEnd: z.number().finite(),
    cutVolume: z.number().finite().nonnegative(),
    fillVolume: z.number().finite().nonnegative()
  })
  .strict();

export const MaterialItemV1Z = z
  .object({
    id: RecordIdZ,
    name: z.string(),
    // null = the host could not read quantities for this item
    quantities: z.array(QuantityRecordV1Z).nullable()
  })
  .strict();

export const MaterialListV1Z = z
  .object({
    id: RecordIdZ,
    name: z.string(),
    alignmentId: RecordIdZ,
    items: z.array(MaterialItemV1Z)
  })
  .strict();

export const AlignmentV1Z = z
  .object({
    id: RecordIdZ,
    name: z.string()
  })
  .strict();

export const CrossSectionDocumentV1Z = z
  .object({
    type: z.literal("cross_section_document_v1"),
    schema_version: SemVerZ,
    alignments: z.array(AlignmentV1Z),
    material_lists: z.array(MaterialListV1Z)
  })
  .strict()
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.alignments.forEach((a, i) => {
      if (seen.has(a.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["alignments", i, "id"],
          message: `duplicate alignment id: ${a.id}`
        });
      }
      seen.add(a.id);
    });
  });

export type QuantityRecordV1 = z.infer<typeof QuantityRecordV1Z>;
export type MaterialItemV1 = z.infer<typeof MaterialItemV1Z>;
export type MaterialListV1 = z.infer<typeof MaterialListV1Z>;
export type AlignmentV1 = z.infer<typeof AlignmentV1Z>;
export type CrossSectionDocumentV1 = z.infer<typeof CrossSectionDocumentV1Z>;

export function parseCrossSectionDocumentV1(input: unknown): CrossSectionDocumentV1 {
  return CrossSectionDocumentV1Z.parse(input); // throws ZodError on any shape violation
}
