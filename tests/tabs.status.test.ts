import { describe, it } from "mocha";
import { expect } from "chai";
import * as fc from "fast-check";

import { StatusTransitionError } from "../src/errors.js";
import {
  allowedTransitions,
  assertTransition,
  canTransition,
  isTabStatus,
  TAB_STATUSES,
  type TabStatus,
} from "../src/tabs/status.js";

describe("tabs/status", () => {
  it("lists the successors of every status", () => {
    expect(allowedTransitions("new")).to.deep.equal(["fetch_pending"]);
    expect(allowedTransitions("fetch_pending")).to.deep.equal(["parsed", "fetch_error"]);
    expect(allowedTransitions("fetch_error")).to.deep.equal(["fetch_pending"]);
    expect(allowedTransitions("parsed")).to.deep.equal(["llm_pending"]);
    expect(allowedTransitions("llm_pending")).to.deep.equal(["enriched", "llm_error"]);
    expect(allowedTransitions("llm_error")).to.deep.equal(["llm_pending"]);
    expect(allowedTransitions("enriched")).to.deep.equal([]);
  });

  it("only moves backward from an error state into its own pending state", () => {
    const order: Record<TabStatus, number> = {
      new: 0,
      fetch_pending: 1,
      fetch_error: 2,
      parsed: 2,
      llm_pending: 3,
      llm_error: 4,
      enriched: 4,
    };
    const backward = TAB_STATUSES.flatMap((from) =>
      allowedTransitions(from)
        .filter((to) => order[to] < order[from])
        .map((to) => `${from}->${to}`),
    );

    expect(backward).to.deep.equal(["fetch_error->fetch_pending", "llm_error->llm_pending"]);
    expect(canTransition("enriched", "llm_pending")).to.equal(false);
    expect(canTransition("parsed", "fetch_pending")).to.equal(false);
  });

  it("recognises stored status strings", () => {
    expect(isTabStatus("parsed")).to.equal(true);
    expect(isTabStatus("archived")).to.equal(false);
    expect(isTabStatus(3)).to.equal(false);
  });

  it("rejects transitions that skip a stage", () => {
    expect(canTransition("new", "parsed")).to.equal(false);
    expect(canTransition("parsed", "enriched")).to.equal(false);
    expect(() => assertTransition(7, "new", "enriched"))
      .to.throw(StatusTransitionError, "Tab 7 cannot move from new to enriched")
      .with.property("code", "E-STATUS-TRANSITION");
  });

  it("only reaches enriched through llm_pending along any valid walk", () => {
    const statusArb = fc.constantFrom<TabStatus>(...TAB_STATUSES);
    fc.assert(
      fc.property(fc.array(fc.nat(), { maxLength: 30 }), (choices) => {
        let current: TabStatus = "new";
        const visited: TabStatus[] = [current];
        for (const choice of choices) {
          const next = allowedTransitions(current);
          current = next[choice % next.length] ?? current;
          visited.push(current);
        }
        visited.forEach((status, index) => {
          if (status === "enriched") {
            expect(visited[index - 1]).to.equal("llm_pending");
          }
          if (status === "parsed") {
            expect(visited[index - 1]).to.equal("fetch_pending");
          }
        });
      }),
    );
    fc.assert(
      fc.property(statusArb, statusArb, (from, to) => {
        expect(canTransition(from, to)).to.equal(allowedTransitions(from).includes(to));
      }),
    );
  });
});
