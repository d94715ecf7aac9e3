export * from "./tweet";
