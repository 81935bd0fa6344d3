import { describe, it, expect } from "vitest";
import {
  extractTotalPages,
  pageUrl,
  parseCategoryLinks,
  parseListingPage,
  parseProductLinks,
  parseProductPage,
} from "../lib/catalog/parsers";
import { ParseError } from "../lib/errors";
import { BASE_URL, fixture } from "./mock-catalog";

const INDEX_URL = `${BASE_URL}category/books_1/index.html`;
const TRAVEL_URL = `${BASE_URL}category/books/travel_2/index.html`;
const LANTERNS_URL = `${BASE_URL}lanterns-in-rain_201/index.html`;

describe("parseCategoryLinks", () => {
  const categories = parseCategoryLinks(fixture("catalog-index.html"), INDEX_URL);

  it("returns sidebar categories in display order, skipping the Books root", () => {
    expect(categories.map((c) => c.name)).toEqual([
      "Travel",
      "Mystery",
      "Fiction",
      "Default",
      "Poetry",
      "Humor",
    ]);
  });

  it("resolves relative hrefs against the page URL", () => {
    expect(categories[0].url).toBe(TRAVEL_URL);
  });

  it("returns nothing for a page without a sidebar", () => {
    expect(parseCategoryLinks(fixture("empty-category.html"), INDEX_URL)).toEqual([]);
  });
});

describe("parseProductLinks", () => {
  it("collects product links from the listing in order", () => {
    expect(parseProductLinks(fixture("travel-page-1.html"), TRAVEL_URL)).toEqual([
      `${BASE_URL}walking-the-salt-roads_101/index.html`,
      `${BASE_URL}a-map-of-quiet-harbors_102/index.html`,
    ]);
  });

  it("returns an empty list for an empty category", () => {
    expect(parseProductLinks(fixture("empty-category.html"), TRAVEL_URL)).toEqual([]);
  });
});

describe("extractTotalPages", () => {
  it("reads the last page from the pager", () => {
    expect(extractTotalPages(fixture("travel-page-1.html"))).toBe(2);
    expect(extractTotalPages(fixture("travel-page-2.html"))).toBe(2);
  });

  it("defaults to one page without a pager", () => {
    expect(extractTotalPages(fixture("poetry-page.html"))).toBe(1);
  });

  it("handles page counts with more than one digit", () => {
    const html = `<ul class="pager"><li class="current">Page 1 of 12</li></ul>`;
    expect(extractTotalPages(html)).toBe(12);
  });
});

describe("parseListingPage", () => {
  it("returns links, the displayed result count and the page count", () => {
    expect(parseListingPage(fixture("travel-page-1.html"), TRAVEL_URL)).toEqual({
      productUrls: [
        `${BASE_URL}walking-the-salt-roads_101/index.html`,
        `${BASE_URL}a-map-of-quiet-harbors_102/index.html`,
      ],
      resultCount: 3,
      totalPages: 2,
    });
  });

  it("accepts an empty product grid", () => {
    expect(parseListingPage(fixture("empty-category.html"), TRAVEL_URL)).toEqual({
      productUrls: [],
      resultCount: 0,
      totalPages: 1,
    });
  });

  it("leaves the result count null when the page does not show one", () => {
    const html = `<section><ol class="row"></ol></section>`;
    expect(parseListingPage(html, TRAVEL_URL).resultCount).toBeNull();
  });

  it("throws ParseError when the product grid is missing", () => {
    expect(() => parseListingPage(fixture("maintenance.html"), TRAVEL_URL)).toThrow(ParseError);
    expect(() => parseListingPage(fixture("maintenance.html"), TRAVEL_URL)).toThrow(
      `Listing page has no product grid (${TRAVEL_URL})`
    );
  });
});

describe("pageUrl", () => {
  it("keeps index.html for the first page", () => {
    expect(pageUrl(TRAVEL_URL, 1)).toBe(TRAVEL_URL);
  });

  it("builds page-N.html next to the category index", () => {
    expect(pageUrl(TRAVEL_URL, 2)).toBe(`${BASE_URL}category/books/travel_2/page-2.html`);
  });
});

describe("parseProductPage", () => {
  const record = parseProductPage(fixture("product-lanterns-in-rain.html"), LANTERNS_URL);

  it("returns the displayed values as strings", () => {
    expect(record).toEqual({
      "Product name": "Lanterns in Rain",
      URL: LANTERNS_URL,
      Rating: "Four",
      UPC: "1234abcd5678ef90",
      "Product Type": "Books",
      "Price (excl. tax)": "£12.00",
      "Price (incl. tax)": "£14.40",
      Tax: "£2.40",
      Availability: "Out of stock",
      "Number of reviews": "3",
      Description: "Short poems written during a wet autumn.",
    });
  });

  it("keeps page order for the keys", () => {
    expect(Object.keys(record)).toEqual([
      "Product name",
      "URL",
      "Rating",
      "UPC",
      "Product Type",
      "Price (excl. tax)",
      "Price (incl. tax)",
      "Tax",
      "Availability",
      "Number of reviews",
      "Description",
    ]);
  });

  it("returns a frozen record", () => {
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("throws ParseError when the title is missing", () => {
    const url = `${BASE_URL}broken-listing_301/index.html`;
    expect(() => parseProductPage(fixture("product-malformed.html"), url)).toThrow(ParseError);
    expect(() => parseProductPage(fixture("product-malformed.html"), url)).toThrow(
      `Product page has no title (${url})`
    );
  });

  it("throws ParseError when the rating is missing", () => {
    const html = `<article class="product_page"><div class="product_main"><h1>No Stars</h1></div></article>`;
    expect(() => parseProductPage(html, LANTERNS_URL)).toThrow("Product page has no star rating");
  });
});
