// Volume Kernel - Cross-section volume command
//
// One invocation: resolve the alignment, collect its material lists, aggregate,
// render. Selection failures abort before collection; everything past selection
// ends in a report or a soft no-data outcome with the contained faults attached.
// The command never throws.

import { aggregateVolumes } from "../aggregator/aggregator";
import { collectMaterialLists } from "../collector/collector";
import type { AlignmentRef, MaterialListSource } from "../host/material_list_source";
import type { RenderOptions } from "../reporter/reporter";
import { NO_VOLUME_DATA_MESSAGE, renderVolumeReport } from "../reporter/reporter";
import type { ReportFault, VolumeReportTable } from "../report/types";
import { describeError } from "../report/types";

export const COMMAND_CANCELLED_MESSAGE = "Command cancelled.";
export const ALIGNMENT_NOT_FOUND_MESSAGE = "Failed to get Alignment object.";
export const NO_MATERIAL_LISTS_MESSAGE = "No Material Lists found for the selected Alignment.";

/**
 * Structured-log sink. pino loggers and Fastify's req.log satisfy it.
 */
export interface CommandLogger {
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
}

export interface CrossSectionVolumeContext {
  // Read-only host view, held open by the caller for the whole call.
  source: MaterialListSource;

  // Caller-resolved selection; null/undefined/blank means nothing was selected.
  alignmentId: string | null | undefined;

  profile?: RenderOptions;
  logger?: CommandLogger;
}

export type CrossSectionVolumeOutcome =
  | { kind: "cancelled"; message: string }
  | { kind: "no_data"; message: string; alignment: AlignmentRef; faults: ReadonlyArray<ReportFault> }
  | {
      kind: "report";
      text: string;
      alignment: AlignmentRef;
      table: VolumeReportTable;
      faults: ReadonlyArray<ReportFault>;
    }
  | { kind: "failed"; message: string };

function logFaults(logger: CommandLogger | undefined, faults: ReadonlyArray<ReportFault>): void {
  if (!logger) return;
  for (const f of faults) {
    logger.warn({ code: f.code, recordId: f.recordId, reason: f.reason }, "cross-section record skipped");
  }
}

function runSelected(ctx: CrossSectionVolumeContext, alignmentId: string): CrossSectionVolumeOutcome {
  const alignment = ctx.source.resolveAlignment(alignmentId);
  if (!alignment) {
    return { kind: "cancelled", message: ALIGNMENT_NOT_FOUND_MESSAGE };
  }

  const collected = collectMaterialLists(alignment.id, ctx.source);
  logFaults(ctx.logger, collected.faults);
  if (collected.lists.length === 0) {
    return { kind: "no_data", message: NO_MATERIAL_LISTS_MESSAGE, alignment, faults: collected.faults };
  }

  const aggregated = aggregateVolumes(collected.lists);
  logFaults(ctx.logger, aggregated.faults);
  const faults = Object.freeze([...collected.faults, ...aggregated.faults]);

  if (aggregated.table.rows.length === 0) {
    return { kind: "no_data", message: NO_VOLUME_DATA_MESSAGE, alignment, faults };
  }

  return {
    kind: "report",
    text: renderVolumeReport(aggregated.table, ctx.profile),
    alignment,
    table: aggregated.table,
    faults
  };
}

/**
 * Runs the cross-section volume report for one selected alignment.
 */
export function runCrossSectionVolumeReport(ctx: CrossSectionVolumeContext): CrossSectionVolumeOutcome {
  const alignmentId = typeof ctx.alignmentId === "string" ? ctx.alignmentId.trim() : "";
  if (alignmentId.length === 0) {
    ctx.logger?.info({ outcome: "cancelled" }, COMMAND_CANCELLED_MESSAGE);
    return { kind: "cancelled", message: COMMAND_CANCELLED_MESSAGE };
  }

  let outcome: CrossSectionVolumeOutcome;
  try {
    outcome = runSelected(ctx, alignmentId);
  } catch (err) {
    // Host faults outside list/item granularity (e.g. alignment lookup) land here.
    outcome = { kind: "failed", message: `Error: ${describeError(err)}` };
  }

  if (outcome.kind === "report") {
    ctx.logger?.info(
      {
        outcome: outcome.kind,
        alignmentId,
        rows: outcome.table.rows.length,
        totalCut: outcome.table.totalCut,
        totalFill: outcome.table.totalFill,
        faults: outcome.faults.length
      },
      "cross-section volume report rendered"
    );
  } else {
    ctx.logger?.info({ outcome: outcome.kind, alignmentId }, outcome.message);
  }
  return outcome;
}
