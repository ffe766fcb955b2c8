export * from "./parser/base";
export * from "./parser/feeder";
export * from "./parser/event";
export * from "./parser/stream";
export * from "./parser/async";
export * from "./printer";
