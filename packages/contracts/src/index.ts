export * from "./schema/threshold_config_v1";
export * from "./schema/sample_v1";
export * from "./schema/classification_v1";
export * from "./schema/registry_v1";
