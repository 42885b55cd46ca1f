export * from "./schema/channel_v1";
export * from "./schema/reading_v1";
export * from "./schema/processed_record_v1";
export * from "./schema/weather_sample_v1";
export * from "./schema/correlation_result_v1";
export * from "./schema/progress_event_v1";
export * from "./schema/ona_run_options_v1";
export * from "./schema/job_status_v1";
