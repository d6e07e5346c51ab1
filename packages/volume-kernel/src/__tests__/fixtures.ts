// Shared test helpers for @earthwork/volume-kernel.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { parseCrossSectionDocumentV1 } from "@earthwork/contracts";
import type { CrossSectionDocumentV1 } from "@earthwork/contracts";

import type {
  MaterialItemRecord,
  MaterialListRecord,
  MaterialListSource,
  QuantityRecord
} from "../host/material_list_source";

const HERE = path.dirname(fileURLToPath(import.meta.url));

export function readFixtureDocument(name: string): CrossSectionDocumentV1 {
  const abs = path.resolve(HERE, "..", "..", "fixtures", name); // anchored on this file, not cwd
  return parseCrossSectionDocumentV1(JSON.parse(fs.readFileSync(abs, "utf8")));
}

export function q(stationStart: number, stationEnd: number, cutVolume: number, fillVolume: number): QuantityRecord {
  return { stationStart, stationEnd, cutVolume, fillVolume };
}

export function item(id: string, name: string, quantities: QuantityRecord[] | Error): MaterialItemRecord {
  return {
    id,
    name,
    readQuantities: () => {
      if (quantities instanceof Error) throw quantities;
      return quantities;
    }
  };
}

/**
 * A list whose item enumeration throws after `failAfter` items when given.
 */
export function list(
  id: string,
  name: string,
  alignmentId: string,
  items: MaterialItemRecord[],
  failAfter?: { count: number; error: Error }
): MaterialListRecord {
  return {
    id,
    name,
    alignmentId,
    *listItems() {
      let n = 0;
      for (const it of items) {
        if (failAfter && n === failAfter.count) throw failAfter.error;
        yield it;
        n++;
      }
      if (failAfter && n === failAfter.count) throw failAfter.error;
    }
  };
}

export function source(
  lists: MaterialListRecord[],
  alignments: Array<{ id: string; name: string }> = [{ id: "AL-1", name: "Mainline" }]
): MaterialListSource {
  return {
    resolveAlignment: (id) => alignments.find((a) => a.id === id),
    listMaterialLists: () => lists
  };
}

export interface LogEntry {
  level: "info" | "warn";
  obj: Record<string, unknown>;
  msg: string;
}

export function recordingLogger(): { entries: LogEntry[]; info: (o: Record<string, unknown>, m: string) => void; warn: (o: Record<string, unknown>, m: string) => void } {
  const entries: LogEntry[] = [];
  return {
    entries,
    info: (obj, msg) => entries.push({ level: "info", obj, msg }),
    warn: (obj, msg) => entries.push({ level: "warn", obj, msg })
  };
}
