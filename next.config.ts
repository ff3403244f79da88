import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // PDF/DOCX parsers load workers and zip readers at runtime and should not be bundled.
  serverExternalPackages: ["pdf-parse", "pdfjs-dist", "mammoth"],
};

export default nextConfig;
