import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  transpilePackages: ["@sku-lookup/catalog"],
  serverExternalPackages: ["pino", "pino-pretty"],
};

export default nextConfig;
