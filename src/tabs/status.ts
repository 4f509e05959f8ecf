import { StatusTransitionError } from "../errors.js";

export const TAB_STATUSES = [
  "new",
  "fetch_pending",
  "parsed",
  "fetch_error",
  "llm_pending",
  "enriched",
  "llm_error",
] as const;

export type TabStatus = (typeof TAB_STATUSES)[number];

/**
 * Lifecycle table. `enriched` is terminal. Re-entering the pending state of
 * the stage that failed is the only backward move; no transition skips a stage.
 */
const TRANSITIONS: Readonly<Record<TabStatus, readonly TabStatus[]>> = {
  new: ["fetch_pending"],
  fetch_pending: ["parsed", "fetch_error"],
  fetch_error: ["fetch_pending"],
  parsed: ["llm_pending"],
  llm_pending: ["enriched", "llm_error"],
  llm_error: ["llm_pending"],
  enriched: [],
};

/** Statuses from which enrichment may start. */
export const ENRICHABLE_STATUSES: readonly TabStatus[] = ["parsed", "llm_error"];

/** Statuses recording a failed stage. */
export const ERROR_STATUSES: readonly TabStatus[] = ["fetch_error", "llm_error"];

export function isTabStatus(value: unknown): value is TabStatus {
  return TAB_STATUSES.some((status) => status === value);
}

export function canTransition(from: TabStatus, to: TabStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function allowedTransitions(from: TabStatus): readonly TabStatus[] {
  return TRANSITIONS[from];
}

/** Throws {@link StatusTransitionError} unless `from → to` is in the table. */
export function assertTransition(tabId: number, from: TabStatus, to: TabStatus): void {
  if (!canTransition(from, to)) {
    throw new StatusTransitionError(tabId, from, to);
  }
}
