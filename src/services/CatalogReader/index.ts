export * from "./CatalogReader";
export * from "./CatalogReaderSqlite";
export * from "./CatalogRows";
