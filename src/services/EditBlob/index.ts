export * from "./EditBlobDecoder";
