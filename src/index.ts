export * from "./coff/errors";
export * from "./coff/extent";
export * from "./coff/image";
export * from "./coff/names";
export * from "./coff/section";
export * from "./coff/sectionTable";
export * from "./dataOps";
export * from "./loader";
export * from "./logger";
export * from "./memoryImage";
