export * from "./LibraryMigrationService";
export * from "./LibraryMigrationServiceDefault";
