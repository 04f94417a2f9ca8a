import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // exceljs pulls in node streams; keep it out of the server bundle.
  serverExternalPackages: ['exceljs'],
};

export default nextConfig;
