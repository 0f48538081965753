/**
 * Page Info Extractor
 *
 * Reads what a probe reports about the loaded page: title, final URL,
 * a headline found through an ordered selector list, the HTML length
 * and an excerpt of the body text.
 */
import type { Logger } from "pino";
import { logger as sharedLogger } from "../../monitoring/logger";
import type { PageDriver } from "../browser/page-driver";
import { errorMessage, ExtractionError, ProbeError } from "../../shared/errors/probe.errors";
import type { ExtractionOptions, PageHeadline, PageSnapshot } from "../../shared/types/probe.types";

/** Headline text must be longer than this to count */
const MIN_HEADLINE_LENGTH = 2;

/** First `length` code points of text; never splits a surrogate pair. */
export function excerpt(text: string, length: number): string {
  return Array.from(text).slice(0, length).join("");
}

/**
 * Find the first selector whose element has meaningful text.
 * Selectors that throw (invalid syntax, detached node) are skipped.
 */
export async function findHeadline(
  page: PageDriver,
  selectors: readonly string[],
  logger: Logger = sharedLogger
): Promise<PageHeadline | null> {
  for (const selector of selectors) {
    try {
      const text = (await page.textOf(selector))?.trim();
      if (text && text.length > MIN_HEADLINE_LENGTH) {
        logger.info({ selector, text }, "Found content");
        return { selector, text };
      }
    } catch (error) {
      logger.debug({ selector, error: errorMessage(error) }, "Selector lookup failed");
    }
  }
  return null;
}

/**
 * @throws ExtractionError when the title, URL or HTML cannot be read
 */
export async function extractPageInfo(
  page: PageDriver,
  options: ExtractionOptions,
  logger: Logger = sharedLogger
): Promise<PageSnapshot> {
  try {
    const headline = await findHeadline(page, options.contentSelectors, logger);
    const documentTitle = (await page.title()).trim();
    if (!headline) {
      logger.info({ title: documentTitle }, "Using page title");
    }

    const url = page.url();
    const sourceLength = (await page.html()).length;
    logger.info({ url, sourceLength }, "Page details");

    let bodyExcerpt = "";
    try {
      bodyExcerpt = excerpt(await page.bodyText(), options.excerptLength);
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Could not extract page content");
    }

    return {
      title: documentTitle || headline?.text || url,
      url,
      headline,
      sourceLength,
      bodyExcerpt,
    };
  } catch (error) {
    if (error instanceof ProbeError) throw error;
    throw new ExtractionError(`Failed to read page: ${errorMessage(error)}`, { cause: error });
  }
}
