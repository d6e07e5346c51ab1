// Volume Kernel - Report types
//
// Everything here is produced once per invocation and frozen before it leaves
// the kernel.

/**
 * One cross-section segment of the report, derived from one quantity record.
 */
export interface VolumeRow {
  readonly materialListName: string;
  readonly materialName: string;
  readonly stationStart: number;
  readonly stationEnd: number;
  readonly cutVolume: number;
  readonly fillVolume: number;

  // cutVolume - fillVolume, never clamped.
  readonly netVolume: number;

  // Running totals over the whole report, including this row.
  readonly cumulativeCut: number;
  readonly cumulativeFill: number;
}

/**
 * Rows in traversal order plus the grand totals (the last cumulative values).
 */
export interface VolumeReportTable {
  readonly rows: ReadonlyArray<VolumeRow>;
  readonly totalCut: number;
  readonly totalFill: number;
}

/**
 * COLLECTION_FAULT: a material list (or the document's list enumeration) could not be read.
 * EXTRACTION_FAULT: the quantities of one material item could not be read.
 */
export type ReportFaultCode = "COLLECTION_FAULT" | "EXTRACTION_FAULT";

/**
 * A contained host fault. Faults never abort the command; they are returned
 * next to whatever data could be read.
 */
export interface ReportFault {
  readonly code: ReportFaultCode;
  readonly recordId: string;
  readonly reason: string;
}

/**
 * Id used when the document's list enumeration itself fails.
 */
export const DOCUMENT_RECORD_ID = "document";

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function makeFault(code: ReportFaultCode, recordId: string, err: unknown): ReportFault {
  return Object.freeze({ code, recordId, reason: describeError(err) });
}
