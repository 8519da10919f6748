import { DEFAULT_MAX_WORKERS, toWireBatch } from "@sku-lookup/catalog";
import { NextResponse } from "next/server";
import { z } from "zod";

import { requireBasicAuth } from "@/lib/auth";
import { errorResponse } from "@/lib/errors";
import { summarizeSkus, withRequestLog } from "@/lib/request-log";
import { getService } from "@/lib/service";

const MAX_WORKERS_CAP = 100;

const lookupSchema = z.object({
  sku_ids: z.array(z.string().trim().min(1)),
  max_workers: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_WORKERS)
    .transform((value) => Math.min(value, MAX_WORKERS_CAP)),
});

export const POST = withRequestLog(async (request, _context, log) => {
  const unauthorized = requireBasicAuth(request);
  if (unauthorized) {
    return unauthorized;
  }

  try {
    const payload = lookupSchema.parse(await request.json());
    log.info(
      { skuCount: payload.sku_ids.length, skus: summarizeSkus(payload.sku_ids), maxWorkers: payload.max_workers },
      "Batch lookup",
    );

    const service = await getService();
    const batch = await service.fetchMany(payload.sku_ids, payload.max_workers);
    return NextResponse.json(toWireBatch(batch));
  } catch (error) {
    return errorResponse(error, log);
  }
});
