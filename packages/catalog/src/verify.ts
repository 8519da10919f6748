import { z } from "zod";

import { parsePriceFromText } from "./price";
import type { BatchResult, WireProductEntry } from "./types";
import { isWireFailure, toWireEntry } from "./wire";

const FIELD_VALUE = z.union([z.string(), z.number()]).nullable().optional();

export const EXPECTED_RECORD_SCHEMA = z.object({
  sku: z.string().trim().min(1),
  brand: FIELD_VALUE,
  stock_quantity: FIELD_VALUE,
  stock_status: FIELD_VALUE,
  sale_price: FIELD_VALUE,
  regular_price: FIELD_VALUE,
});

export const EXPECTED_FILE_SCHEMA = z.array(EXPECTED_RECORD_SCHEMA);

export type ExpectedRecord = z.infer<typeof EXPECTED_RECORD_SCHEMA>;

export const COMPARED_FIELDS = ["brand", "stock_quantity", "stock_status", "sale_price", "regular_price"] as const;

export type ComparedField = (typeof COMPARED_FIELDS)[number];

export type FieldMismatch = {
  field: ComparedField | "all";
  expected: string;
  actual: string;
  reason?: string;
};

export type RecordComparison = {
  sku: string;
  hasMismatches: boolean;
  mismatches: FieldMismatch[];
};

export type VerificationReport = {
  checked: number;
  matched: number;
  comparisons: RecordComparison[];
};

type BatchRunner = (skus: string[]) => Promise<BatchResult>;

export function compareRecord(expected: ExpectedRecord, actual: WireProductEntry | undefined): RecordComparison {
  if (!actual || isWireFailure(actual)) {
    return {
      sku: expected.sku,
      hasMismatches: true,
      mismatches: [
        {
          field: "all",
          expected: "record",
          actual: actual ? actual.error.reason : "",
          reason: actual ? actual.error.detail : "No API data returned",
        },
      ],
    };
  }

  const mismatches: FieldMismatch[] = [];
  for (const field of COMPARED_FIELDS) {
    const expectedValue = normalizeField(field, expected[field]);
    const actualValue = normalizeField(field, actual[field]);
    if (expectedValue !== actualValue) {
      mismatches.push({ field, expected: expectedValue, actual: actualValue });
    }
  }

  return {
    sku: expected.sku,
    hasMismatches: mismatches.length > 0,
    mismatches,
  };
}

export async function verifyExpectedRecords(
  expected: readonly ExpectedRecord[],
  runBatch: BatchRunner,
  batchSize = 10,
): Promise<VerificationReport> {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const comparisons: RecordComparison[] = [];

  for (const batch of chunk(expected, batchSize)) {
    const result = await runBatch(batch.map((record) => record.sku.toUpperCase()));
    batch.forEach((record, index) => {
      const entry = result.results[index];
      comparisons.push(compareRecord(record, entry ? toWireEntry(entry) : undefined));
    });
  }

  return {
    checked: comparisons.length,
    matched: comparisons.filter((comparison) => !comparison.hasMismatches).length,
    comparisons,
  };
}

function normalizeField(field: ComparedField, value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }

  const text = String(value).trim();
  if (!text) {
    return "";
  }

  if (field === "sale_price" || field === "regular_price") {
    const parsed = parsePriceFromText(text);
    return parsed === null ? text : String(parsed);
  }

  if (field === "stock_quantity" || field === "stock_status") {
    const parsed = Number(text.replace(/,/g, ""));
    return Number.isFinite(parsed) ? String(parsed) : text;
  }

  return text;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const output: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    output.push(items.slice(index, index + size));
  }
  return output;
}
