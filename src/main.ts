import "maplibre-gl/dist/maplibre-gl.css";
import "./style.css";

import { BOSTON_DISTRICTS } from "./data/districts";
import { createLogger } from "./lib/logger";
import { wireEstimateForm } from "./ui/estimateForm";
import { mountLocationSelector } from "./ui/locationSelector";

const logger = createLogger("app");

const start = () => {
  const selector = mountLocationSelector(document, {
    districts: BOSTON_DISTRICTS,
    onModeChange: (mode) => logger.debug(`Location picker switched to ${mode} mode`),
    onSelectionChange: (codes) => logger.debug("Selected locations", codes),
  });

  const form = document.getElementById("search-form");
  const results = document.getElementById("estimate-results");
  const estimateForm =
    form instanceof HTMLFormElement && results
      ? wireEstimateForm(form, results, { districts: BOSTON_DISTRICTS })
      : null;

  if (import.meta.hot) {
    import.meta.hot.dispose(() => {
      selector?.destroy();
      estimateForm?.destroy();
    });
  }
};

if (document.readyState === "loading") {
  document.addEventListener("DOMContentLoaded", start, { once: true });
} else {
  start();
}
