import { createCatalogService, type CatalogService } from "@sku-lookup/catalog";

let servicePromise: Promise<CatalogService> | null = null;

/** Process-wide service, built from the environment on first use. */
export function getService(): Promise<CatalogService> {
  if (!servicePromise) {
    servicePromise = createCatalogService().catch((error: unknown) => {
      servicePromise = null;
      throw error;
    });
  }
  return servicePromise;
}
