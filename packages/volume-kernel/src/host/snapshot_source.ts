// Volume Kernel - Snapshot-backed MaterialListSource
//
// Adapts a validated cross_section_document_v1 snapshot to the host capability.
// An item whose quantities are null reproduces an unreadable host record.

import type { CrossSectionDocumentV1, MaterialItemV1, MaterialListV1 } from "@earthwork/contracts";
import type {
  AlignmentRef,
  MaterialItemRecord,
  MaterialListRecord,
  MaterialListSource,
  QuantityRecord
} from "./material_list_source";

function toItemRecord(item: MaterialItemV1): MaterialItemRecord {
  const quantities = item.quantities === null ? null : Object.freeze(item.quantities.map((q) => Object.freeze({ ...q })));
  return {
    id: item.id,
    name: item.name,
    readQuantities(): ReadonlyArray<QuantityRecord> {
      if (quantities === null) {
        throw new Error(`QUANTITIES_UNREADABLE: item:${item.id}`);
      }
      return quantities;
    }
  };
}

function toListRecord(list: MaterialListV1): MaterialListRecord {
  const items = list.items.map(toItemRecord);
  return {
    id: list.id,
    name: list.name,
    alignmentId: list.alignmentId,
    listItems: () => items
  };
}

/**
 * Builds a MaterialListSource over an in-memory document snapshot.
 *
 * Records keep the snapshot's order; the snapshot itself is not retained.
 */
export function createSnapshotSource(doc: CrossSectionDocumentV1): MaterialListSource {
  const alignments = new Map<string, AlignmentRef>();
  for (const a of doc.alignments) {
    alignments.set(a.id, Object.freeze({ id: a.id, name: a.name }));
  }
  const lists = Object.freeze(doc.material_lists.map(toListRecord));

  return {
    resolveAlignment: (alignmentId) => alignments.get(alignmentId),
    listMaterialLists: () => lists
  };
}
