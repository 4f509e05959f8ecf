import { describe, it } from "mocha";
import { expect } from "chai";

import { SocialPostExtractor } from "../src/extract/socialExtractor.js";
import { loadPage } from "./helpers/fixtures.js";

describe("extract/socialExtractor", () => {
  const extractor = new SocialPostExtractor();

  it("matches status URLs on the known hosts only", () => {
    expect(extractor.matches("https://x.com/grace/status/1234567890")).to.equal(true);
    expect(extractor.matches("https://mobile.twitter.com/grace/status/42")).to.equal(true);
    expect(extractor.matches("https://x.com/grace")).to.equal(false);
    expect(extractor.matches("https://example.com/grace/status/42")).to.equal(false);
  });

  it("reads the post from its link-preview meta tags", async () => {
    const output = await extractor.extract("https://x.com/grace/status/1234567890", loadPage("post.html"));

    expect(output).to.deep.equal({
      siteKind: "twitter",
      title: "Grace Example on X",
      textFull: "Shipping the new index today",
      wordCount: 5,
      videoSeconds: null,
      metadata: {
        url: "https://x.com/grace/status/1234567890",
        domain: "x.com",
        platform: "x",
        author: { username: "grace", display_name: "Grace Example", twitter_handle: "@grace" },
        tweet_id: "1234567890",
        image: "https://images.example/post.jpg",
        site_name: "X (formerly Twitter)",
        content_type: "article",
        card_type: "summary",
      },
    });
  });

  it("falls back to the document title when no meta tag is present", async () => {
    const html = "<html><head><title>Someone (@someone) / Twitter</title></head><body></body></html>";

    const output = await extractor.extract("https://twitter.com/someone/status/7", html);

    expect(output.title).to.equal("Someone (@someone)");
    expect(output.textFull).to.equal("Someone (@someone)");
    expect(output.wordCount).to.equal(2);
    expect(output.metadata).to.deep.equal({
      url: "https://twitter.com/someone/status/7",
      domain: "twitter.com",
      platform: "twitter",
      author: { username: "someone", display_name: "Someone" },
      tweet_id: "7",
    });
  });
});
