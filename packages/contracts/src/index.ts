export * from "./schema/phase_sample_v1";
export * from "./schema/engine_config_v1";
export * from "./schema/event_status_v1";
