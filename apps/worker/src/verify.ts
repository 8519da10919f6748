import "dotenv/config";

import { readFile } from "node:fs/promises";

import {
  createCatalogService,
  createLogger,
  describeError,
  EXPECTED_FILE_SCHEMA,
  verifyExpectedRecords,
} from "@sku-lookup/catalog";

import { parseVerifyArgs } from "./args";
import { formatReport } from "./report";

const logger = createLogger("verify");

async function main() {
  const args = parseVerifyArgs(process.argv.slice(2));
  const expected = EXPECTED_FILE_SCHEMA.parse(JSON.parse(await readFile(args.expectedPath, "utf8")));
  const service = await createCatalogService();

  logger.info({ records: expected.length, batchSize: args.batchSize }, "Verifying expected records");
  const report = await verifyExpectedRecords(expected, (skus) => service.fetchMany(skus), args.batchSize);

  process.stdout.write(`${formatReport(report)}\n`);
  if (report.matched < report.checked) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error({ error: describeError(error) }, "Verification failed");
  process.exitCode = 1;
});
