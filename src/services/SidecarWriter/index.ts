export * from "./SidecarWriter";
export * from "./SidecarWriterExifTool";
