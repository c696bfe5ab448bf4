import { describe, expect, it } from "vitest";
import { canonicalizeUrl, isDocumentUrl, listPageUrl } from "../url.js";

const ROOT = "https://letters.test/publications/letters/";

describe("canonicalizeUrl", () => {
  it("resolves relative links against the page", () => {
    expect(canonicalizeUrl("/publications/letters/2025/03/rates/", ROOT)).toBe(
      "https://letters.test/publications/letters/2025/03/rates"
    );
  });

  it("drops fragments, tracking parameters and host case", () => {
    expect(canonicalizeUrl("https://Letters.TEST/a/b/?utm_source=mail&id=7&fbclid=x#section")).toBe(
      "https://letters.test/a/b?id=7"
    );
  });

  it("leaves no empty query behind", () => {
    expect(canonicalizeUrl("https://letters.test/a?utm_medium=rss")).toBe("https://letters.test/a");
  });

  it("rejects links that are not http(s)", () => {
    expect(() => canonicalizeUrl("mailto:desk@letters.test")).toThrow(TypeError);
    expect(() => canonicalizeUrl("http://")).toThrow();
  });
});

describe("listPageUrl", () => {
  it("uses the root for the first page and /page/N/ after it", () => {
    expect(listPageUrl(ROOT, 1)).toBe(ROOT);
    expect(listPageUrl(ROOT, 3)).toBe("https://letters.test/publications/letters/page/3/");
    expect(listPageUrl("https://letters.test/publications/letters", 2)).toBe(
      "https://letters.test/publications/letters/page/2/"
    );
  });
});

describe("isDocumentUrl", () => {
  it("accepts documents below the root only", () => {
    expect(isDocumentUrl("https://letters.test/publications/letters/2025/03/rates", ROOT)).toBe(true);
    expect(isDocumentUrl("https://letters.test/publications/letters", ROOT)).toBe(false);
    expect(isDocumentUrl("https://letters.test/publications/letters/page/4", ROOT)).toBe(false);
    expect(isDocumentUrl("https://letters.test/about", ROOT)).toBe(false);
    expect(isDocumentUrl("https://other.test/publications/letters/2025/03/rates", ROOT)).toBe(false);
  });
});
