#!/usr/bin/env node

/**
 * Smoke test the Clio integration against the configured environment.
 *
 * Lists matters and, when CLIO_SMOKE_MATTER_ID is set, creates a one-minute time entry on it.
 *
 * Usage:
 *   npx tsx scripts/clio-smoke.ts
 */

import { config } from "dotenv";

import { createClioClientFromEnv } from "../src/lib/clio/client";
import { getEnvironmentInfo } from "../src/lib/config/environment";

config({ path: ".env.local" });

async function run() {
  console.log("Environment:", getEnvironmentInfo());

  const client = createClioClientFromEnv();
  const matters = await client.listMatters();
  console.log(`Matters (${matters.length}):`);
  for (const matter of matters.slice(0, 10)) {
    console.log(`  ${matter.id}  ${matter.name}  [${matter.status ?? "unknown"}]`);
  }

  const matterId = process.env.CLIO_SMOKE_MATTER_ID;
  if (!matterId) {
    console.log("Set CLIO_SMOKE_MATTER_ID to also create a time entry.");
    return;
  }

  const end = new Date();
  const start = new Date(end.getTime() - 60 * 1000);
  const entry = await client.createTimeEntry({
    matterId,
    startTime: start.toISOString(),
    endTime: end.toISOString(),
    durationSeconds: 60,
    description: "Smoke test entry",
  });
  console.log("Created time entry:", entry.id);
}

run().catch((err) => {
  console.error("Clio smoke test failed:", err);
  process.exit(1);
});
