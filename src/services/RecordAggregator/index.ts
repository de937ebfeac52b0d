export * from "./RecordAggregator";
export * from "./RecordAggregatorDefault";
