import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import type { FetchConfig } from "../src/config/index.js";
import { FetchError, FetchSizeExceededError, FetchTimeoutError, HttpStatusError } from "../src/errors.js";
import { PageFetcher } from "../src/extract/fetcher.js";

const CONFIG: FetchConfig = { timeoutMs: 1_000, maxBytes: 64, userAgent: "tab-triage-tests" };

async function captureFailure(task: Promise<unknown>): Promise<unknown> {
  try {
    await task;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

describe("extract/fetcher", () => {
  it("sends browser-like headers and decodes the body", async () => {
    const fetchImpl = sinon
      .stub<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .resolves(new Response("<p>héllo</p>", { status: 200, headers: { "content-type": "text/html; charset=utf-8" } }));
    const fetcher = new PageFetcher(CONFIG, { fetchImpl });

    const page = await fetcher.fetchPage("https://example.com/a");

    expect(page).to.deep.equal({
      requestedUrl: "https://example.com/a",
      finalUrl: "https://example.com/a",
      status: 200,
      contentType: "text/html; charset=utf-8",
      html: "<p>héllo</p>",
    });
    const [url, init] = fetchImpl.firstCall.args;
    expect(url).to.equal("https://example.com/a");
    expect(init?.headers).to.deep.include({ "user-agent": "tab-triage-tests" });
  });

  it("rejects HTTP error statuses", async () => {
    const fetchImpl = sinon
      .stub<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .resolves(new Response("missing", { status: 404 }));

    const failure = await captureFailure(new PageFetcher(CONFIG, { fetchImpl }).fetchPage("https://example.com/gone"));

    expect(failure).to.be.instanceOf(HttpStatusError);
    expect(failure).to.have.property("status", 404);
    expect(failure).to.have.property("code", "E-FETCH-HTTP");
  });

  it("stops reading bodies above the byte ceiling", async () => {
    const fetchImpl = sinon
      .stub<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .resolves(new Response("x".repeat(65), { status: 200 }));

    const failure = await captureFailure(new PageFetcher(CONFIG, { fetchImpl }).fetchPage("https://example.com/big"));

    expect(failure).to.be.instanceOf(FetchSizeExceededError);
    expect(failure).to.have.property("message", "Payload of https://example.com/big exceeds 64 bytes");
  });

  it("reports timeouts", async () => {
    const fetchImpl: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const fetcher = new PageFetcher({ ...CONFIG, timeoutMs: 10 }, { fetchImpl });

    const failure = await captureFailure(fetcher.fetchPage("https://example.com/slow"));

    expect(failure).to.be.instanceOf(FetchTimeoutError);
    expect(failure).to.have.property("code", "E-FETCH-TIMEOUT");
  });

  it("wraps transport failures and invalid URLs", async () => {
    const fetchImpl = sinon
      .stub<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .rejects(new TypeError("getaddrinfo ENOTFOUND example.invalid"));
    const fetcher = new PageFetcher(CONFIG, { fetchImpl });

    const transport = await captureFailure(fetcher.fetchPage("https://example.invalid/"));
    expect(transport).to.be.instanceOf(FetchError);
    expect(transport).to.have.property(
      "message",
      "Failed to fetch https://example.invalid/: getaddrinfo ENOTFOUND example.invalid",
    );
    expect(transport).to.have.property("code", "E-FETCH-NETWORK");

    const invalid = await captureFailure(fetcher.fetchPage("not a url"));
    expect(invalid).to.have.property("message", "Invalid URL not a url");
    sinon.assert.calledOnce(fetchImpl);
  });
});
