export * from "./schema/document_snapshot_v1";
export * from "./schema/report_profile_v1";
