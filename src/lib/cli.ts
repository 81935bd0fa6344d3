import { EXPORT_FORMATS, type NormalizeOptions } from "./types";
import { withBookScraper, type BookScraperOptions } from "./scraper";

export interface CliArgs {
  category?: string;
  format: string;
  out?: string;
  list: boolean;
  options: NormalizeOptions;
}

const NEGATABLE_FLAGS: Record<string, keyof NormalizeOptions> = {
  "--no-rating-as-float": "ratingAsFloat",
  "--no-parse-prices": "parsePrices",
  "--no-parse-currency": "parseCurrency",
  "--no-parse-availability": "parseAvailability",
};

export const USAGE = [
  "Usage: scrape-category --category <name> [--format df|csv|excel] [--out <path>]",
  "       scrape-category --list",
  "",
  "Options:",
  "  --category <name>          Category to scrape (case-insensitive)",
  `  --format <fmt>             One of ${EXPORT_FORMATS.join(", ")} (default: df)`,
  "  --out <path>               Destination file, required for csv and excel",
  "  --index-by-name            Use product names as the table index",
  ...Object.keys(NEGATABLE_FLAGS).map((flag) => `  ${flag}`),
  "  --list                     Print available categories and exit",
].join("\n");

export function parseArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = { format: "df", list: false, options: {} };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === "--category" || arg === "--format" || arg === "--out") && next === undefined) {
      throw new Error(`${arg} needs a value`);
    }
    if (arg === "--category") {
      parsed.category = next;
      i++;
    } else if (arg === "--format") {
      parsed.format = next;
      i++;
    } else if (arg === "--out") {
      parsed.out = next;
      i++;
    } else if (arg === "--list") {
      parsed.list = true;
    } else if (arg === "--index-by-name") {
      parsed.options.productNameAsIndex = true;
    } else if (Object.hasOwn(NEGATABLE_FLAGS, arg)) {
      parsed.options[NEGATABLE_FLAGS[arg]] = false;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return parsed;
}

/** Runs one CLI invocation; returns the process exit code. */
export async function runCli(argv: string[], scraperOptions: BookScraperOptions = {}): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    console.error(USAGE);
    return 2;
  }

  if (!args.list && !args.category) {
    console.error(USAGE);
    return 2;
  }

  try {
    await withBookScraper(async (scraper) => {
      if (args.list) {
        const categories = await scraper.listCategories();
        console.log(categories.map((c) => c.name).join("\n"));
        return;
      }
      const category = args.category ?? "";
      const table = await scraper.saveData(category, args.format, args.out, args.options);
      if (table) {
        console.log(JSON.stringify(table.toRecords(), null, 2));
      }
    }, scraperOptions);
    return 0;
  } catch (err) {
    console.error(`[books] Failed:`, err instanceof Error ? err.message : err);
    return 1;
  }
}
