export * from "./locateAll";
export * from "./filterAndLimit";
