import { describe, it } from "mocha";
import { expect } from "chai";

import { buildMessages, buildPromptContext } from "../src/enrich/prompt.js";

describe("enrich/prompt", () => {
  it("substitutes placeholders for missing values", () => {
    const context = buildPromptContext({
      url: "https://example.com/a",
      title: "",
      siteKind: "generic_html",
      text: null,
      wordCount: null,
      videoSeconds: null,
    });

    expect(context).to.deep.equal({
      url: "https://example.com/a",
      title: "Untitled",
      siteKind: "generic_html",
      text: "No content available",
      wordCount: 0,
      videoSeconds: 0,
    });
  });

  it("truncates long text before the marker is appended", () => {
    const context = buildPromptContext(
      { url: "u", title: "t", siteKind: "youtube", text: "abcdefghij", wordCount: 1, videoSeconds: 90 },
      4,
    );

    expect(context.text).to.equal("abcd... [truncated]");
    expect(context.videoSeconds).to.equal(90);
  });

  it("keeps text that fits exactly", () => {
    const context = buildPromptContext(
      { url: "u", title: "t", siteKind: "twitter", text: "abcd", wordCount: 1, videoSeconds: null },
      4,
    );
    expect(context.text).to.equal("abcd");
  });

  it("renders a system and a user message", () => {
    const messages = buildMessages({
      url: "https://example.com/a",
      title: "A title",
      siteKind: "generic_html",
      text: "Body",
      wordCount: 1,
      videoSeconds: 0,
    });

    expect(messages.map((message) => message.role)).to.deep.equal(["system", "user"]);
    expect(messages[0]?.content).to.contain("content_type");
    expect(messages[1]?.content).to.equal(
      [
        "URL: https://example.com/a",
        "Title: A title",
        "Site kind: generic_html",
        "Word count: 1",
        "Video duration (seconds, 0 if not a video): 0",
        "",
        "Content:",
        "Body",
      ].join("\n"),
    );
  });
});
