#!/usr/bin/env -S npx tsx

import { writeFile } from "node:fs/promises";
import { createApp } from "~/app";
import { openApiConfig } from "~/lib/openapi";
import { loadConfig } from "~/utils/config";

const output = process.argv[2] ?? "./openapi.json";

const app = createApp(loadConfig({ NODE_ENV: "production" }));
const doc = app.getOpenAPIDocument(openApiConfig);

try {
  const json = JSON.stringify(doc, null, 2);
  await writeFile(output, json);
  console.log(
    `OpenAPI spec generated at ${output} (${(json.length / 1024).toFixed(2)} KB)`,
  );
} catch (error) {
  console.error("Failed to write OpenAPI spec:", error);
  process.exitCode = 1;
}
