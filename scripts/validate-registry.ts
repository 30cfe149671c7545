import { access, readFile } from "node:fs/promises";
import { constants } from "node:fs";
import path from "node:path";
import { isRegistry, validateRegistry } from "../src/lib/registry";

async function main() {
  const arg = process.argv[2];
  if (!arg) {
    console.error("Usage: npx tsx scripts/validate-registry.ts <models.json>");
    process.exitCode = 1;
    return;
  }
  const registryPath = path.resolve(process.cwd(), arg);
  await access(registryPath, constants.R_OK);

  const data: unknown = JSON.parse(await readFile(registryPath, "utf8"));
  if (!isRegistry(data)) {
    const problems = validateRegistry(data);
    console.error(`Registry validation failed (${problems.length} problem(s)):`);
    for (const problem of problems) {
      console.error(`- ${problem}`);
    }
    process.exitCode = 1;
    return;
  }

  console.log(`Registry OK: ${Object.keys(data).length} record(s) in ${path.basename(registryPath)}`);
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
