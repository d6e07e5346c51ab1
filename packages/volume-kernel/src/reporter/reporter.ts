// Volume Kernel - Reporter
//
// Renders a VolumeReportTable as a fixed-width text table:
// rule / title / rule / header / rule / rows / rule / summary / rule.
// The table is only read here.

import type { VolumeReportTable, VolumeRow } from "../report/types";
import { formatFixed, padCell, rule, truncate } from "./format";

export const REPORT_WIDTH = 120;

export const DEFAULT_REPORT_TITLE = "EXCAVATION AND FILLING VOLUME INFORMATION - CROSS SECTION";

export const DEFAULT_VOLUME_UNIT = "m³";

export const NO_VOLUME_DATA_MESSAGE = "No volume data found.";

const STATION_DIGITS = 3;
const VOLUME_DIGITS = 2;

/**
 * Column captions and widths, in output order.
 */
export const REPORT_COLUMNS = Object.freeze([
  { caption: "Material List", width: 20 },
  { caption: "Material", width: 15 },
  { caption: "Start Stn", width: 12 },
  { caption: "End Stn", width: 12 },
  { caption: "Cut Vol", width: 12 },
  { caption: "Fill Vol", width: 12 },
  { caption: "Net Vol", width: 12 },
  { caption: "Cum Cut", width: 12 },
  { caption: "Cum Fill", width: 12 }
] as const);

export interface RenderOptions {
  title?: string;
  volumeUnit?: string;
}

function renderLine(cells: ReadonlyArray<string>): string {
  return cells.map((c, i) => padCell(c, REPORT_COLUMNS[i]?.width ?? 0)).join(" ");
}

function rowCells(row: VolumeRow): string[] {
  return [
    truncate(row.materialListName, REPORT_COLUMNS[0].width),
    truncate(row.materialName, REPORT_COLUMNS[1].width),
    formatFixed(row.stationStart, STATION_DIGITS),
    formatFixed(row.stationEnd, STATION_DIGITS),
    formatFixed(row.cutVolume, VOLUME_DIGITS),
    formatFixed(row.fillVolume, VOLUME_DIGITS),
    formatFixed(row.netVolume, VOLUME_DIGITS),
    formatFixed(row.cumulativeCut, VOLUME_DIGITS),
    formatFixed(row.cumulativeFill, VOLUME_DIGITS)
  ];
}

/**
 * Renders the volume report, or the no-data notice when the table has no rows.
 */
export function renderVolumeReport(table: VolumeReportTable, options: RenderOptions = {}): string {
  if (table.rows.length === 0) {
    return NO_VOLUME_DATA_MESSAGE;
  }

  const title = options.title ?? DEFAULT_REPORT_TITLE;
  const unit = options.volumeUnit ?? DEFAULT_VOLUME_UNIT;
  const net = table.totalCut - table.totalFill;

  const lines: string[] = [
    rule("=", REPORT_WIDTH),
    title,
    rule("=", REPORT_WIDTH),
    renderLine(REPORT_COLUMNS.map((c) => c.caption)),
    rule("-", REPORT_WIDTH)
  ];

  for (const row of table.rows) {
    lines.push(renderLine(rowCells(row)));
  }

  lines.push(
    rule("-", REPORT_WIDTH),
    `SUMMARY: Total Cut Volume: ${formatFixed(table.totalCut, VOLUME_DIGITS)} ${unit}, ` +
      `Total Fill Volume: ${formatFixed(table.totalFill, VOLUME_DIGITS)} ${unit}, ` +
      `Net Volume: ${formatFixed(net, VOLUME_DIGITS)} ${unit}`,
    rule("=", REPORT_WIDTH)
  );

  return lines.join("\n") + "\n";
}
