import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // The board is server-rendered per request; storage is reached from route handlers only.
  serverExternalPackages: ['@supabase/supabase-js'],
};

export default nextConfig;
