import { formatRent } from "../lib/format";
import { createLogger } from "../lib/logger";
import { requestEstimate, type EstimateRequestInput, type EstimateResult } from "../lib/estimateClient";
import type { District } from "../types/location";
import { readListingFeatures, readLocationSubmission } from "./locationForm";

const logger = createLogger("estimate-form");

export interface EstimateFormOptions {
  districts: District[];
  estimate?: (input: EstimateRequestInput) => Promise<EstimateResult>;
}

export interface EstimateFormController {
  /** Resolves once every requested estimate has settled and rendered. */
  submit: () => Promise<void>;
  destroy: () => void;
}

type RowOutcome = { code: string; price: number } | { code: string; error: string };

const renderRow = (doc: Document, label: string, text: string, failed: boolean): HTMLElement => {
  const row = doc.createElement("li");
  row.className = failed ? "estimate-row estimate-row--error" : "estimate-row";
  const name = doc.createElement("span");
  name.className = "estimate-row__label";
  name.textContent = label;
  const value = doc.createElement("span");
  value.className = "estimate-row__value";
  value.textContent = text;
  row.append(name, value);
  return row;
};

export const wireEstimateForm = (
  form: HTMLFormElement,
  results: HTMLElement,
  { districts, estimate = (input) => requestEstimate(input) }: EstimateFormOptions,
): EstimateFormController => {
  const labels = new Map(districts.map((d) => [d.code, d.label]));
  const doc = results.ownerDocument;

  const setStatus = (message: string) => {
    const status = doc.createElement("p");
    status.className = "estimate-status";
    status.textContent = message;
    results.replaceChildren(status);
  };

  const submit = async () => {
    const { locations } = readLocationSubmission(form);
    const features = readListingFeatures(form);
    if (locations.length === 0) {
      setStatus("Pick at least one neighborhood to get an estimate.");
      return;
    }

    setStatus("Estimating…");
    const outcomes = await Promise.all(
      locations.map(async (code): Promise<RowOutcome> => {
        try {
          const result = await estimate({ location: code, features });
          return { code, price: result.price };
        } catch (error) {
          logger.warn(`Estimate for "${code}" failed`, error);
          return { code, error: error instanceof Error ? error.message : "Estimate failed" };
        }
      }),
    );

    const list = doc.createElement("ul");
    list.className = "estimate-list";
    for (const outcome of outcomes) {
      const label = labels.get(outcome.code) ?? outcome.code;
      list.appendChild(
        "price" in outcome
          ? renderRow(doc, label, formatRent(outcome.price), false)
          : renderRow(doc, label, outcome.error, true),
      );
    }
    results.replaceChildren(list);
  };

  const handleSubmit = (event: Event) => {
    event.preventDefault();
    submit().catch((error: unknown) => {
      logger.error("Estimate submission failed", error);
      setStatus("Something went wrong. Please try again.");
    });
  };

  form.addEventListener("submit", handleSubmit);

  return {
    submit,
    destroy: () => form.removeEventListener("submit", handleSubmit),
  };
};
