// ===== Enums =====

export enum Column {
  PRODUCT_NAME = "Product name",
  URL = "URL",
  RATING = "Rating",
  UPC = "UPC",
  PRODUCT_TYPE = "Product Type",
  PRICE_EXCL_TAX = "Price (excl. tax)",
  PRICE_INCL_TAX = "Price (incl. tax)",
  TAX = "Tax",
  AVAILABILITY = "Availability",
  NUMBER_OF_REVIEWS = "Number of reviews",
  DESCRIPTION = "Description",
  CURRENCY = "Currency", // derived from Price (incl. tax)
}

export const EXPORT_FORMATS = ["df", "csv", "excel"] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
  return (EXPORT_FORMATS as readonly string[]).includes(value);
}

// ===== Raw Record (page output, strings as displayed) =====

export type RawRecord = Readonly<Record<string, string>>;

// ===== Normalized cells =====

export type Cell = string | number | null;

export type NormalizedRecord = Record<string, Cell>;

export interface NormalizeOptions {
  productNameAsIndex?: boolean;
  ratingAsFloat?: boolean;
  parsePrices?: boolean;
  parseCurrency?: boolean;
  parseAvailability?: boolean;
}

// ===== Category discovery =====

export interface CategoryLink {
  name: string;
  url: string;
}
