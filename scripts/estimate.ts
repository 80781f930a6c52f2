#!/usr/bin/env tsx
import "dotenv/config";

import { createFileModelLoader } from "../api/_shared/modelStore";
import { formatRent } from "../src/lib/format";
import { predictPrice, roundToCents } from "../src/lib/priceEstimate";
import { parseEstimateArgs, USAGE, UsageError } from "./_shared/estimateArgs";

const main = async () => {
  const args = parseEstimateArgs(process.argv.slice(2));
  const loadBundle = createFileModelLoader(args.modelsDir);

  const price = roundToCents(await predictPrice(args.features, args.location, loadBundle));

  if (args.json) {
    console.log(JSON.stringify({ location: args.location, features: args.features, price }));
    return;
  }
  console.log(`[estimate] ${args.location}: ${formatRent(price)} (${price.toFixed(2)})`);
};

main().catch((error) => {
  if (error instanceof UsageError) {
    console.error(`[estimate] ${error.message}\n${USAGE}`);
  } else {
    console.error("[estimate] fatal error:", error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
});
