import { config } from "./config";
import {
  isExportFormat,
  type CategoryLink,
  type ExportFormat,
  type NormalizeOptions,
  type RawRecord,
} from "./types";
import {
  CategoryNotFoundError,
  MissingArgumentError,
  ParseError,
  UnsupportedFormatError,
} from "./errors";
import { HttpSession, type SessionOptions } from "./scraping/session";
import { fetchPage } from "./scraping/utils";
import {
  pageUrl,
  parseCategoryLinks,
  parseListingPage,
  parseProductPage,
} from "./catalog/parsers";
import { normalizeRecords } from "./normalization";
import { ProductTable } from "./table";
import { writeCsv, writeExcel } from "./export";

const CATALOG_INDEX_PATH = "category/books_1/index.html";

export interface BookScraperOptions extends SessionOptions {
  baseUrl?: string;
  headers?: Record<string, string>;
}

/**
 * Scraper bound to one HTTP session. Open it with `open()` and release it with
 * `close()`, or let `withBookScraper` do both.
 */
export class BookScraper {
  private readonly session: HttpSession;
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(options: BookScraperOptions = {}) {
    const { baseUrl = config.baseUrl, headers = {}, ...sessionOptions } = options;
    this.baseUrl = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
    this.headers = headers;
    this.timeoutMs = sessionOptions.timeoutMs ?? config.timeoutMs;
    this.session = new HttpSession(sessionOptions);
  }

  get isOpen(): boolean {
    return this.session.isOpen;
  }

  get isClosed(): boolean {
    return this.session.isClosed;
  }

  async open(): Promise<this> {
    this.session.open();
    return this;
  }

  async close(): Promise<void> {
    await this.session.close();
  }

  /** Every category listed on the catalog index, in sidebar order. */
  async listCategories(): Promise<CategoryLink[]> {
    const indexUrl = new URL(CATALOG_INDEX_PATH, this.baseUrl).href;
    const categories = parseCategoryLinks(await this.fetch(indexUrl), indexUrl);
    if (categories.length === 0) {
      throw new ParseError("Catalog index has no category links", indexUrl);
    }
    return categories;
  }

  /**
   * Raw records for every product in `category`, in display order across all
   * listing pages. Matching is case-insensitive and exact: "travel" finds
   * "Travel", "Travel Guides" does not.
   */
  async scrape(category: string): Promise<RawRecord[]> {
    const productUrls = await this.collectProductUrls(category);

    const records: RawRecord[] = [];
    for (const url of productUrls) {
      records.push(parseProductPage(await this.fetch(url), url));
    }

    console.log(`[books] Scraped ${records.length} products from "${category}"`);
    return records;
  }

  saveData(category: string, format: "df", path?: string, options?: NormalizeOptions): Promise<ProductTable>;
  saveData(category: string, format: "csv" | "excel", path: string, options?: NormalizeOptions): Promise<undefined>;
  saveData(category: string, format: string, path?: string, options?: NormalizeOptions): Promise<ProductTable | undefined>;
  async saveData(
    category: string,
    format: string,
    path?: string,
    options: NormalizeOptions = {}
  ): Promise<ProductTable | undefined> {
    const fmt = validateFormat(format, path);

    const records = await this.scrape(category);
    if (records.length === 0) {
      console.warn(`[books] No products found in "${category}"`);
    }
    const table = normalizeRecords(records, options);

    switch (fmt) {
      case "df":
        return table;
      case "csv":
        await writeCsv(table, requirePath(path));
        return undefined;
      case "excel":
        await writeExcel(table, requirePath(path));
        return undefined;
    }
  }

  private async collectProductUrls(category: string): Promise<string[]> {
    const wanted = category.trim().toLowerCase();
    if (!wanted) {
      throw new MissingArgumentError("category", "a category name is required");
    }

    const categories = await this.listCategories();
    const match = categories.find((c) => c.name.toLowerCase() === wanted);
    if (!match) {
      throw new CategoryNotFoundError(
        category,
        categories.map((c) => c.name)
      );
    }

    const firstPage = parseListingPage(await this.fetch(match.url), match.url);
    const urls = [...firstPage.productUrls];

    for (let page = 2; page <= firstPage.totalPages; page++) {
      const url = pageUrl(match.url, page);
      urls.push(...parseListingPage(await this.fetch(url), url).productUrls);
    }

    if (firstPage.resultCount !== null && urls.length !== firstPage.resultCount) {
      throw new ParseError(
        `Listing shows ${firstPage.resultCount} results but ${urls.length} product links were found`,
        match.url
      );
    }

    return urls;
  }

  private fetch(url: string): Promise<string> {
    return fetchPage(url, {
      dispatcher: this.session.dispatcher,
      headers: this.headers,
      timeoutMs: this.timeoutMs,
    });
  }
}

function validateFormat(format: string, path: string | undefined): ExportFormat {
  if (!isExportFormat(format)) throw new UnsupportedFormatError(format);
  if (format !== "df") requirePath(path, format);
  return format;
}

function requirePath(path: string | undefined, format = "file"): string {
  if (!path || !path.trim()) {
    throw new MissingArgumentError("path", `required for "${format}" output`);
  }
  return path;
}

/**
 * Opens a scraper, runs `fn`, and closes the session whether `fn` resolves
 * or throws.
 */
export async function withBookScraper<T>(
  fn: (scraper: BookScraper) => Promise<T>,
  options: BookScraperOptions = {}
): Promise<T> {
  const scraper = new BookScraper(options);
  await scraper.open();
  try {
    return await fn(scraper);
  } finally {
    await scraper.close();
  }
}
