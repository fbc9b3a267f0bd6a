export * from "./types/transcript";
export * from "./types/subtitle";
export * from "./utils/errors";
export * from "./utils/transcript";
export * from "./utils/chunker";
export * from "./utils/speaker-colors";
export * from "./utils/speakers";
export * from "./utils/timestamps";
export * from "./utils/track";
export * from "./renderers";
