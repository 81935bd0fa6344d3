export { BookScraper, withBookScraper } from "./lib/scraper";
export type { BookScraperOptions } from "./lib/scraper";
export { ProductTable } from "./lib/table";
export {
  normalizeRecord,
  normalizeRecords,
  parseAvailability,
  parseCount,
  parseCurrencySymbol,
  parseRating,
  NORMALIZATION_PIPELINE,
} from "./lib/normalization";
export { parsePrice, formatPrice } from "./lib/scraping/utils";
export { writeCsv, writeExcel } from "./lib/export";
export {
  ScrapeError,
  NetworkError,
  CategoryNotFoundError,
  ParseError,
  MissingArgumentError,
  UnsupportedFormatError,
  SessionNotOpenError,
  SessionClosedError,
} from "./lib/errors";
export type { ScrapeErrorKind } from "./lib/errors";
export { Column, EXPORT_FORMATS, isExportFormat } from "./lib/types";
export type {
  Cell,
  CategoryLink,
  ExportFormat,
  NormalizeOptions,
  NormalizedRecord,
  RawRecord,
} from "./lib/types";
