import * as cheerio from "cheerio";
import { Column, type CategoryLink, type RawRecord } from "../types";
import { ParseError } from "../errors";

/** Sidebar category links on any catalogue page, in display order. */
export function parseCategoryLinks(html: string, pageUrl: string): CategoryLink[] {
  const $ = cheerio.load(html);
  const categories: CategoryLink[] = [];

  $("ul a[href^='../books/']").each((_, el) => {
    const href = $(el).attr("href");
    const name = $(el).text().trim();
    if (!href || !name) return;
    categories.push({ name, url: new URL(href, pageUrl).href });
  });

  return categories;
}

export function parseProductLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];

  $("article.product_pod > h3 > a").each((_, el) => {
    const href = $(el).attr("href");
    if (!href) return;
    links.push(new URL(href, pageUrl).href);
  });

  return links;
}

/** Reads "Page 1 of 3" from the pager; a category without a pager has one page. */
export function extractTotalPages(html: string): number {
  const $ = cheerio.load(html);
  const text = $("ul.pager li.current").first().text().trim();
  if (!text) return 1;
  const match = text.match(/of\s+(\d+)/i);
  if (!match) return 1;
  const total = parseInt(match[1], 10);
  return isNaN(total) || total < 1 ? 1 : total;
}

export interface ListingPage {
  productUrls: string[];
  /** The "N results" count shown above the grid, when present. */
  resultCount: number | null;
  totalPages: number;
}

/**
 * One category listing page. Throws ParseError when the product grid is
 * missing, so an error or maintenance page is never read as an empty category.
 */
export function parseListingPage(html: string, pageUrl: string): ListingPage {
  const $ = cheerio.load(html);
  if ($("section ol.row").length === 0) {
    throw new ParseError("Listing page has no product grid", pageUrl);
  }

  const countText = $("form.form-horizontal strong").first().text().trim();
  const resultCount = /^\d+$/.test(countText) ? parseInt(countText, 10) : null;

  return {
    productUrls: parseProductLinks(html, pageUrl),
    resultCount,
    totalPages: extractTotalPages(html),
  };
}

export function pageUrl(categoryUrl: string, page: number): string {
  if (page <= 1) return categoryUrl;
  return new URL(`page-${page}.html`, categoryUrl).href;
}

export function parseProductPage(html: string, url: string): RawRecord {
  const $ = cheerio.load(html);
  const $main = $("article.product_page div.product_main").first();

  const name = $main.find("h1").first().text().trim();
  if (!name) throw new ParseError("Product page has no title", url);

  const ratingClasses = ($main.find("p.star-rating").first().attr("class") || "").split(/\s+/);
  const rating = ratingClasses.find((c) => c && c !== "star-rating");
  if (!rating) throw new ParseError("Product page has no star rating", url);

  const record: Record<string, string> = {
    [Column.PRODUCT_NAME]: name,
    [Column.URL]: url,
    [Column.RATING]: rating,
  };

  // Product information table: UPC, type, prices, tax, availability, reviews
  $("article.product_page table.table.table-striped tr").each((_, tr) => {
    const key = $(tr).find("th").first().text().trim();
    if (!key) return;
    record[key] = $(tr).find("td").first().text().trim();
  });

  record[Column.DESCRIPTION] = $("#product_description").next("p").text().trim();

  return Object.freeze(record);
}
