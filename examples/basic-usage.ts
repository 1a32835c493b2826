/**
 * Basic Usage Example
 *
 * Creates a settings file, changes a few values and registers a module.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { openParameters, registerModule, listModules } from "@paramstore/sdk";

async function main() {
  const root = "./examples-data/basic";
  const dataDir = join(root, "archive");
  await rm(root, { recursive: true, force: true });
  await mkdir(dataDir, { recursive: true });

  console.log("Creating settings...");
  const params = await openParameters({ path: root, createNew: true });
  console.log(String(params));

  await params.set("data_dirs", dataDir);
  await params.set("clean_level", "dusty");
  await params.set("site_code", "TST");
  console.log(`data_dirs: ${JSON.stringify(params.get("data_dirs"))}`);

  await registerModule(params, { platform: "demo", name: "mag", module: "demo_instruments.mag" });
  for (const entry of listModules(params)) {
    console.log(`module ${entry.platform}/${entry.name} -> ${entry.module}`);
  }

  // A second handle sees the same file
  const other = await openParameters({ path: root });
  console.log(other.describe());

  await params.restoreDefaults();
  console.log(`clean_level after restoreDefaults: ${JSON.stringify(params.get("clean_level"))}`);

  await rm(root, { recursive: true, force: true });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
