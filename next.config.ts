import type { NextConfig } from "next";

// Route handlers only; postgres.js stays a runtime require of the server bundle.
const nextConfig: NextConfig = {
  poweredByHeader: false,
  serverExternalPackages: ["postgres"]
};

export default nextConfig;
