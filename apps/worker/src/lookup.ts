import "dotenv/config";

import { createCatalogService, createLogger, describeError, toWireBatch } from "@sku-lookup/catalog";

import { parseLookupArgs } from "./args";

const logger = createLogger("lookup");

async function main() {
  const args = parseLookupArgs(process.argv.slice(2));
  const service = await createCatalogService();
  const batch = await service.fetchMany(args.skus, args.workers);
  process.stdout.write(`${JSON.stringify(toWireBatch(batch), null, 2)}\n`);
}

main().catch((error: unknown) => {
  logger.error({ error: describeError(error) }, "Lookup failed");
  process.exitCode = 1;
});
