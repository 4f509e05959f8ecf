import { describe, it } from "mocha";
import { expect } from "chai";
import * as fc from "fast-check";
import sinon from "sinon";

import { NoExtractorMatchError } from "../src/errors.js";
import { createDefaultRegistry } from "../src/extract/index.js";
import { ExtractorRegistry } from "../src/extract/registry.js";
import type { Extractor } from "../src/extract/types.js";
import type { ExtractionOutput } from "../src/tabs/types.js";

/** Web URLs the WHATWG parser accepts, with scheme letters randomly upper-cased. */
const mixedCaseWebUrl = fc
  .webUrl({ withQueryParameters: true, withFragments: true })
  .filter((url) => URL.canParse(url))
  .chain((url) => {
    const scheme = url.slice(0, url.indexOf(":"));
    return fc
      .array(fc.boolean(), { minLength: scheme.length, maxLength: scheme.length })
      .map((upper) => {
        const cased = [...scheme].map((char, index) => (upper[index] ? char.toUpperCase() : char)).join("");
        return `${cased}${url.slice(scheme.length)}`;
      });
  });

function fakeExtractor(name: string, accepts: (url: string) => boolean): Extractor {
  const output: ExtractionOutput = {
    siteKind: "generic_html",
    title: name,
    textFull: null,
    wordCount: 0,
    videoSeconds: null,
    metadata: {},
  };
  return { name, siteKind: "generic_html", matches: accepts, extract: async () => output };
}

describe("extract/registry", () => {
  it("dispatches to the first extractor that accepts the URL", async () => {
    const registry = new ExtractorRegistry([
      fakeExtractor("docs", (url) => url.includes("/docs/")),
      fakeExtractor("fallback", () => true),
    ]);

    expect(registry.selectExtractor("https://example.com/docs/a")?.name).to.equal("docs");
    expect((await registry.extract("https://example.com/blog", "<p></p>")).title).to.equal("fallback");
  });

  it("fails when no extractor accepts the URL", async () => {
    const registry = new ExtractorRegistry([fakeExtractor("docs", () => false)]);

    let failure: unknown;
    try {
      await registry.extract("mailto:someone@example.com", "");
    } catch (error) {
      failure = error;
    }
    expect(failure).to.be.instanceOf(NoExtractorMatchError);
    expect(failure).to.have.property("message", "No extractor accepts mailto:someone@example.com");
  });

  it("refuses registrations once sealed", () => {
    const registry = new ExtractorRegistry().register(fakeExtractor("a", () => true)).seal();

    expect(() => registry.register(fakeExtractor("b", () => true))).to.throw("Registry is sealed; cannot register b");
    expect(registry.list()).to.deep.equal(["a"]);
  });

  it("orders the default registry from specific to generic", () => {
    const registry = createDefaultRegistry(undefined, { execFile: sinon.stub() });

    expect(registry.list()).to.deep.equal(["youtube", "twitter", "generic_html"]);
    expect(registry.selectExtractor("https://youtu.be/abc123")?.name).to.equal("youtube");
    expect(registry.selectExtractor("https://x.com/grace/status/1")?.name).to.equal("twitter");
    expect(registry.selectExtractor("https://x.com/grace")?.name).to.equal("generic_html");
    expect(registry.selectExtractor("ftp://files.example/a")).to.equal(null);
  });

  it("finds an extractor for every parseable HTTP(S) URL", () => {
    const registry = createDefaultRegistry(undefined, { execFile: sinon.stub() });

    fc.assert(
      fc.property(mixedCaseWebUrl, (url) => {
        expect(registry.selectExtractor(url), url).to.not.equal(null);
      }),
    );
    expect(registry.selectExtractor("HTTPS://Example.com/a")?.name).to.equal("generic_html");
    expect(registry.selectExtractor("Http://www.YouTube.com/watch?v=abc123")?.name).to.equal("youtube");
  });

  it("only routes numeric status paths to the post extractor", () => {
    const registry = createDefaultRegistry(undefined, { execFile: sinon.stub() });

    expect(registry.selectExtractor("https://twitter.com/grace/status/1234567890/photo/1")?.name).to.equal("twitter");
    expect(registry.selectExtractor("https://x.com/i/web/status/42")?.name).to.equal("twitter");
    expect(registry.selectExtractor("https://x.com/a/status/")?.name).to.equal("generic_html");
    expect(registry.selectExtractor("https://x.com/a/status/abc")?.name).to.equal("generic_html");
  });
});
