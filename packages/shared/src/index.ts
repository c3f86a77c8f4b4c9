export * from "./types";
export * from "./types/alerts";
export * from "./indicators";
export * from "./schemas";
export * from "./env";
