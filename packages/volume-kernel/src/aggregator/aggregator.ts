// Volume Kernel - Aggregator
//
// Walks lists -> items -> quantities in the order given and emits one VolumeRow
// per quantity record. The running totals start at zero once per aggregation
// and are never reset per list or per item.

import type { MaterialItemRecord, MaterialListRecord, QuantityRecord } from "../host/material_list_source";
import type { ReportFault, VolumeReportTable, VolumeRow } from "../report/types";
import { makeFault } from "../report/types";

export interface AggregateResult {
  readonly table: VolumeReportTable;
  readonly faults: ReadonlyArray<ReportFault>;
}

/**
 * Aggregates the given material lists into a frozen report table.
 *
 * Fault containment:
 * - an item whose quantities cannot be read adds no rows and one EXTRACTION_FAULT;
 * - a list whose items cannot be enumerated keeps the rows it already produced
 *   and adds one COLLECTION_FAULT, then aggregation moves to the next list.
 */
export function aggregateVolumes(lists: ReadonlyArray<MaterialListRecord>): AggregateResult {
  const rows: VolumeRow[] = [];
  const faults: ReportFault[] = [];

  let cumulativeCut = 0;
  let cumulativeFill = 0;

  const emit = (listName: string, item: MaterialItemRecord, q: QuantityRecord): void => {
    cumulativeCut += q.cutVolume;
    cumulativeFill += q.fillVolume;
    rows.push(
      Object.freeze({
        materialListName: listName,
        materialName: item.name,
        stationStart: q.stationStart,
        stationEnd: q.stationEnd,
        cutVolume: q.cutVolume,
        fillVolume: q.fillVolume,
        netVolume: q.cutVolume - q.fillVolume,
        cumulativeCut,
        cumulativeFill
      })
    );
  };

  for (const list of lists) {
    try {
      const listName = list.name;
      for (const item of list.listItems()) {
        let quantities: ReadonlyArray<QuantityRecord>;
        try {
          quantities = item.readQuantities();
        } catch (err) {
          faults.push(makeFault("EXTRACTION_FAULT", item.id, err));
          continue;
        }
        for (const q of quantities) {
          emit(listName, item, q);
        }
      }
    } catch (err) {
      faults.push(makeFault("COLLECTION_FAULT", list.id, err));
    }
  }

  const table: VolumeReportTable = Object.freeze({
    rows: Object.freeze(rows),
    totalCut: cumulativeCut,
    totalFill: cumulativeFill
  });

  return Object.freeze({ table, faults: Object.freeze(faults) });
}
