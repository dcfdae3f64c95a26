export * from "./theBasics";
export * from "./advance";
export * from "./locateSlice";
export * from "./iterLines";
