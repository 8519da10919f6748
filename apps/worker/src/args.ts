export type LookupArgs = {
  skus: string[];
  workers?: number;
};

export type VerifyArgs = {
  expectedPath: string;
  batchSize: number;
};

const DEFAULT_VERIFY_BATCH_SIZE = 10;

export function parseLookupArgs(argv: readonly string[]): LookupArgs {
  const skus: string[] = [];
  let workers: number | undefined;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--workers") {
      workers = parsePositiveInt("--workers", argv[index + 1]);
      index += 1;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option ${arg}`);
    } else if (arg.trim()) {
      skus.push(arg.trim());
    }
  }

  if (skus.length === 0) {
    throw new Error("Usage: lookup [--workers N] SKU...");
  }

  return { skus, workers };
}

export function parseVerifyArgs(argv: readonly string[]): VerifyArgs {
  let expectedPath: string | undefined;
  let batchSize = DEFAULT_VERIFY_BATCH_SIZE;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--batch-size") {
      batchSize = parsePositiveInt("--batch-size", argv[index + 1]);
      index += 1;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option ${arg}`);
    } else if (expectedPath === undefined) {
      expectedPath = arg;
    } else {
      throw new Error(`Unexpected argument ${arg}`);
    }
  }

  if (!expectedPath) {
    throw new Error("Usage: verify <expected.json> [--batch-size N]");
  }

  return { expectedPath, batchSize };
}

function parsePositiveInt(option: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${option} expects a positive integer, got ${value ?? "nothing"}`);
  }
  return parsed;
}
