import type { NextConfig } from "next";

const isStaticExport = process.env.CELL_ANALYZER_STATIC === "1";

const nextConfig: NextConfig = {
  allowedDevOrigins: [
    "127.0.0.1",
    "0.0.0.0",
    "localhost",
  ],
  output: isStaticExport ? "export" : undefined,
  trailingSlash: isStaticExport,
  images: { unoptimized: true },
  eslint: { ignoreDuringBuilds: true },
};

export default nextConfig;
