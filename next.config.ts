import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // The SDK is loaded from node_modules at runtime instead of being bundled
  serverExternalPackages: ["@google/genai", "sharp"],
};

export default nextConfig;
