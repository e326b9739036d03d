export { Jurisdiction } from "./jurisdiction";
export type { Alpha2Code, Alpha3Code, AlphaCode } from "./domain/alpha-code";
export {
  alpha2Codes,
  alpha2Ordinal,
  alpha3Codes,
  alpha3Ordinal,
  formatAlpha2,
  formatAlpha3,
  isAlpha2,
  isAlpha3,
  parseAlpha2,
  parseAlpha3,
} from "./domain/alpha-codec";
export {
  INTERMEDIATE_REGIONS,
  REGIONS,
  SUB_REGIONS,
  UNDEFINED,
} from "./domain/region";
export type {
  HierarchyLevel,
  IntermediateRegionClass,
  RegionClass,
  SubRegionClass,
} from "./domain/region";
export {
  ClassificationRegistry,
  getClassificationRegistry,
} from "./domain/classification-registry";
export type { Definition } from "./domain/definition";
export {
  compileClassification,
} from "./compiler/classification-compiler";
export type {
  CompiledClassification,
  ReverseIndex,
} from "./compiler/classification-compiler";
export { decodeRecordFeed, loadBundledFeed } from "./feed/record-feed";
export type { JurisdictionRecord } from "./types/feed";
export {
  ClassificationInvariantError,
  DatasetCompileError,
  UnrecognizedCodeError,
} from "./errors";
export { initLogger, logger } from "./logger";
export { loadConfig } from "./config";
export type { AppConfig, LogLevel } from "./config";
