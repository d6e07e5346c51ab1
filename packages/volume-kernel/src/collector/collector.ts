// Volume Kernel - Collector
//
// Selects the material lists keyed to one alignment, in document enumeration
// order. Faults are returned, never thrown.

import type { MaterialListRecord, MaterialListSource } from "../host/material_list_source";
import type { ReportFault } from "../report/types";
import { DOCUMENT_RECORD_ID, makeFault } from "../report/types";

export interface CollectResult {
  readonly lists: ReadonlyArray<MaterialListRecord>;
  readonly faults: ReadonlyArray<ReportFault>;
}

/**
 * Returns every material list whose alignment reference equals `alignmentId`.
 *
 * An empty result is a valid outcome. If the enumeration breaks part-way, the
 * lists gathered before the break are kept and one document-level fault is added.
 */
export function collectMaterialLists(alignmentId: string, source: MaterialListSource): CollectResult {
  const lists: MaterialListRecord[] = [];
  const faults: ReportFault[] = [];

  try {
    let index = 0;
    for (const list of source.listMaterialLists()) {
      // Fallback id for a record whose own id cannot be read.
      let recordId = `material_list[${index}]`;
      index++;
      try {
        recordId = list.id;
        if (list.alignmentId === alignmentId) {
          lists.push(list);
        }
      } catch (err) {
        faults.push(makeFault("COLLECTION_FAULT", recordId, err));
      }
    }
  } catch (err) {
    faults.push(makeFault("COLLECTION_FAULT", DOCUMENT_RECORD_ID, err));
  }

  return Object.freeze({ lists: Object.freeze(lists), faults: Object.freeze(faults) });
}
