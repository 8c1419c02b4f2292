/**
 * Output document
 *
 * One element per task, in input order. Attributes become a plain object
 * whose keys keep extraction order, except that integer-like keys ("2",
 * "10") are listed first in ascending order, as for any JavaScript object.
 */

import type { RunResult } from "@/core/domain/RunResult";
import type { TaskOutcome } from "@/core/domain/TaskOutcome";
import type { TaskErrorKind } from "@/core/interfaces/ScrapeErrorType";

export interface SuccessElement {
  url: string;
  name: string | null;
  productCode: string | null;
  attributes: Record<string, string>;
  images: string[];
  fetchedAt: string;
}

export interface FailureElement {
  url: string;
  error: TaskErrorKind;
  message: string;
}

export type OutputElement = SuccessElement | FailureElement;

export function toOutputElement(outcome: TaskOutcome): OutputElement {
  if (outcome.kind === "failure") {
    return { url: outcome.url, error: outcome.error, message: outcome.message };
  }
  const { record } = outcome;
  return {
    url: record.sourceUrl,
    name: record.name ?? null,
    productCode: record.productCode ?? null,
    attributes: Object.fromEntries(record.attributes),
    images: [...record.images],
    fetchedAt: record.fetchedAt,
  };
}

export function buildOutputDocument(result: RunResult): OutputElement[] {
  return result.outcomes.map(toOutputElement);
}

export function isSuccessElement(
  element: OutputElement,
): element is SuccessElement {
  return !("error" in element);
}
