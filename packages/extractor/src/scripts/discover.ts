import { buildCatalog, catalogToJson } from "../catalog/catalog";
import { loadSchemas } from "../catalog/schemas";

async function main(): Promise<void> {
  const catalog = buildCatalog(await loadSchemas());
  process.stdout.write(`${JSON.stringify(catalogToJson(catalog), null, 2)}\n`);
}

main().catch((error: unknown) => {
  console.error("discovery failed", error);
  process.exit(1);
});
