import { describe, expect, it } from "vitest";
import { extractPageInfo, findHeadline } from "../../src/scraping/extractors/page-info.extractor";
import { ExtractionError } from "../../src/shared/errors/probe.errors";
import { CONTENT_SELECTORS } from "../../src/config/constants";
import { FakePage, SITE_HTML } from "../helpers/fakes";
import { captureLogs, LEVELS } from "../helpers/log-capture";

const options = { contentSelectors: CONTENT_SELECTORS, excerptLength: 20 };

function loadedPage(overrides: ConstructorParameters<typeof FakePage>[0] = {}): FakePage {
  return new FakePage({ urls: ["https://www.metal-archives.com/"], ...overrides });
}

describe("findHeadline", () => {
  it("skips short texts and failing selectors", async () => {
    const { logger } = captureLogs();
    const page = loadedPage({
      texts: { h1: " ok ", h2: new Error("Node is detached"), ".title": "  Band Search  " },
    });

    expect(await findHeadline(page, CONTENT_SELECTORS, logger)).toEqual({
      selector: ".title",
      text: "Band Search",
    });
  });

  it("returns null when no selector has text", async () => {
    const { logger } = captureLogs();
    expect(await findHeadline(loadedPage(), CONTENT_SELECTORS, logger)).toBeNull();
  });
});

describe("extractPageInfo", () => {
  it("collects title, url, headline, source length and excerpt", async () => {
    const { logger } = captureLogs();
    const page = loadedPage({ texts: { h1: "Encyclopaedia Metallum" } });

    const snapshot = await extractPageInfo(page, options, logger);

    expect(snapshot).toEqual({
      title: "Encyclopaedia Metallum: The Metal Archives",
      url: "https://www.metal-archives.com/",
      headline: { selector: "h1", text: "Encyclopaedia Metallum" },
      sourceLength: SITE_HTML.length,
      bodyExcerpt: "Encyclopaedia Metall",
    });
  });

  it("falls back to the page title when no headline is found", async () => {
    const { logger, withMessage } = captureLogs();

    const snapshot = await extractPageInfo(loadedPage(), options, logger);

    expect(snapshot.headline).toBeNull();
    expect(withMessage("Using page title")[0].title).toBe("Encyclopaedia Metallum: The Metal Archives");
  });

  it("uses the headline, then the URL, when the document title is empty", async () => {
    const { logger } = captureLogs();

    const withHeadline = await extractPageInfo(
      loadedPage({ title: "  ", texts: { nav: "Bands Labels Reviews" } }),
      options,
      logger
    );
    const bare = await extractPageInfo(loadedPage({ title: "" }), options, logger);

    expect(withHeadline.title).toBe("Bands Labels Reviews");
    expect(bare.title).toBe("https://www.metal-archives.com/");
  });

  it("cuts the excerpt on a code point boundary", async () => {
    const { logger } = captureLogs();

    const snapshot = await extractPageInfo(
      loadedPage({ bodyText: "abc\u{1F918}def" }),
      { ...options, excerptLength: 4 },
      logger
    );

    expect(snapshot.bodyExcerpt).toBe("abc\u{1F918}");
  });

  it("keeps going with an empty excerpt when the body cannot be read", async () => {
    const { logger, withMessage } = captureLogs();

    const snapshot = await extractPageInfo(
      loadedPage({ bodyText: new Error("Protocol error") }),
      options,
      logger
    );

    expect(snapshot.bodyExcerpt).toBe("");
    expect(withMessage("Could not extract page content")[0].level).toBe(LEVELS.warn);
  });

  it("raises ExtractionError when the page HTML cannot be read", async () => {
    const { logger } = captureLogs();
    const page = loadedPage({ html: [new Error("Target closed")] });

    await expect(extractPageInfo(page, options, logger)).rejects.toThrow(
      new ExtractionError("Failed to read page: Target closed")
    );
  });
});
