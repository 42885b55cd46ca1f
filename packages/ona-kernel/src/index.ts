// @bcona/ona-kernel
// Entry point exports for the ONA core.

export * from "./errors";
export * from "./ingest/headers";
export * from "./ingest/values";
export * from "./ingest/csv_rows";
export * from "./ingest/reading_source";
export * from "./ingest/weather_source";
export * from "./ona/engine";
export * from "./correlation/stats";
export * from "./correlation/engine";
export * from "./progress/reporter";
export * from "./pipeline";
