export * from "./MetadataExtractor";
export * from "./MetadataExtractorDefault";
