// @earthwork/volume-kernel
// Entry point exports for the cross-section volume pipeline.

export * from "./host/material_list_source";
export * from "./host/snapshot_source";
export * from "./report/types";
export * from "./collector/collector";
export * from "./aggregator/aggregator";
export * from "./reporter/format";
export * from "./reporter/reporter";
export * from "./command/cross_section_volume";
