import { Column, type NormalizeOptions, type NormalizedRecord, type RawRecord } from "./types";
import { ProductTable } from "./table";
import { parsePrice } from "./scraping/utils";

export const DEFAULT_NORMALIZE_OPTIONS: Required<NormalizeOptions> = {
  productNameAsIndex: false,
  ratingAsFloat: true,
  parsePrices: true,
  parseCurrency: true,
  parseAvailability: true,
};

/** Columns a product page is expected to yield, in page order. */
export const RAW_COLUMNS: readonly string[] = [
  Column.PRODUCT_NAME,
  Column.URL,
  Column.RATING,
  Column.UPC,
  Column.PRODUCT_TYPE,
  Column.PRICE_EXCL_TAX,
  Column.PRICE_INCL_TAX,
  Column.TAX,
  Column.AVAILABILITY,
  Column.NUMBER_OF_REVIEWS,
  Column.DESCRIPTION,
];

const PRICE_COLUMNS = [Column.PRICE_EXCL_TAX, Column.PRICE_INCL_TAX, Column.TAX];

const RATING_WORDS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
};

const SOLD_OUT = /^(not in stock|out of stock|sold out|unavailable)$/i;

export function parseRating(raw: string | undefined): number | null {
  if (!raw) return null;
  return RATING_WORDS[raw.trim().toLowerCase()] ?? null;
}

export function parseCurrencySymbol(raw: string | undefined): string | null {
  if (!raw) return null;
  const match = raw.match(/[$£€]/);
  return match ? match[0] : null;
}

export function parseAvailability(raw: string | undefined): number | null {
  if (!raw) return null;
  const trimmed = raw.trim();
  if (SOLD_OUT.test(trimmed)) return 0;
  // "In stock (22 available)" → 22
  const digits = trimmed.replace(/[^\d.]/g, "");
  if (!/^\d+(\.\d+)?$/.test(digits)) return null;
  return parseFloat(digits);
}

export function parseCount(raw: string | undefined): number | null {
  if (!raw) return null;
  const trimmed = raw.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

export interface NormalizationStep {
  name: string;
  /** Column this step adds; existing columns are transformed in place. */
  adds?: string;
  enabled(options: Required<NormalizeOptions>): boolean;
  transform(row: NormalizedRecord, raw: RawRecord): void;
}

// Order matters: currency is read from the displayed price before prices are parsed.
export const NORMALIZATION_PIPELINE: readonly NormalizationStep[] = [
  {
    name: "rating-as-float",
    enabled: (o) => o.ratingAsFloat,
    transform: (row, raw) => {
      row[Column.RATING] = parseRating(raw[Column.RATING]);
    },
  },
  {
    name: "parse-currency",
    adds: Column.CURRENCY,
    enabled: (o) => o.parseCurrency,
    transform: (row, raw) => {
      row[Column.CURRENCY] = parseCurrencySymbol(raw[Column.PRICE_INCL_TAX]);
    },
  },
  {
    name: "parse-prices",
    enabled: (o) => o.parsePrices,
    transform: (row, raw) => {
      for (const column of PRICE_COLUMNS) {
        row[column] = parsePrice(raw[column]);
      }
    },
  },
  {
    name: "parse-availability",
    enabled: (o) => o.parseAvailability,
    transform: (row, raw) => {
      row[Column.AVAILABILITY] = parseAvailability(raw[Column.AVAILABILITY]);
    },
  },
  {
    name: "review-count",
    enabled: () => true,
    transform: (row, raw) => {
      row[Column.NUMBER_OF_REVIEWS] = parseCount(raw[Column.NUMBER_OF_REVIEWS]);
    },
  },
];

export function normalizeRecord(
  raw: RawRecord,
  options: NormalizeOptions = {}
): NormalizedRecord {
  const resolved = { ...DEFAULT_NORMALIZE_OPTIONS, ...options };
  const row: NormalizedRecord = { ...raw };
  for (const step of NORMALIZATION_PIPELINE) {
    if (step.enabled(resolved)) step.transform(row, raw);
  }
  return row;
}

/**
 * Raw records → ProductTable. One row per record, same order. Columns are the
 * raw keys in first-seen order (RAW_COLUMNS when there are no records) plus any
 * column a step adds.
 */
export function normalizeRecords(
  records: readonly RawRecord[],
  options: NormalizeOptions = {}
): ProductTable {
  const resolved = { ...DEFAULT_NORMALIZE_OPTIONS, ...options };

  const columns: string[] = records.length === 0 ? [...RAW_COLUMNS] : [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  for (const step of NORMALIZATION_PIPELINE) {
    if (step.adds && step.enabled(resolved) && !columns.includes(step.adds)) {
      columns.push(step.adds);
    }
  }

  const rows = records.map((record) => normalizeRecord(record, resolved));

  if (!resolved.productNameAsIndex) {
    return new ProductTable(columns, rows);
  }

  return new ProductTable(
    columns.filter((c) => c !== Column.PRODUCT_NAME),
    rows,
    {
      name: Column.PRODUCT_NAME,
      labels: records.map((r) => r[Column.PRODUCT_NAME] ?? ""),
    }
  );
}
