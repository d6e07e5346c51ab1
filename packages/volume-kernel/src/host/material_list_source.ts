// Volume Kernel - Host capability
//
// The kernel never reaches into a live CAD document. A host hands it a
// MaterialListSource for the duration of one call; every read below may fail
// with a host-side fault, and the kernel contains those faults itself.

/**
 * Alignment resolved by the host from an opaque identifier.
 */
export interface AlignmentRef {
  readonly id: string;
  readonly name: string;
}

/**
 * One per-station-range cut/fill record as the host reports it.
 */
export interface QuantityRecord {
  readonly stationStart: number;
  readonly stationEnd: number;
  readonly cutVolume: number;
  readonly fillVolume: number;
}

/**
 * One material type within a material list (topsoil, rock, ...).
 */
export interface MaterialItemRecord {
  readonly id: string;
  readonly name: string;

  // Ordered quantity records. Throws when the host cannot read them.
  readQuantities(): ReadonlyArray<QuantityRecord>;
}

/**
 * A named grouping of earthwork materials keyed to one alignment.
 */
export interface MaterialListRecord {
  readonly id: string;
  readonly name: string;
  readonly alignmentId: string;

  // Items in record order. Enumeration may throw part-way.
  listItems(): Iterable<MaterialItemRecord>;
}

/**
 * Read-only view of the host document, scoped by the caller.
 */
export interface MaterialListSource {
  resolveAlignment(alignmentId: string): AlignmentRef | undefined;
  listMaterialLists(): Iterable<MaterialListRecord>;
}
