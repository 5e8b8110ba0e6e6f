export * from "./ChunkDocumentTool";
export * from "./ConvertDocumentTool";
export * from "./errors";
