export * from "./client";
export * from "./config";
export * from "./date_range";
export * from "./fetch";
export * from "./filter";
export * from "./normalize";
export * from "./parse";
export * from "./run";
export * from "./types";
