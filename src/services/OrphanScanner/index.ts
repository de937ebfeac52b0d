export * from "./OrphanScanner";
export * from "./OrphanScannerDefault";
