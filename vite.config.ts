import { resolve } from 'node:path';
import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), '');
  // Unset variables become '' so config.ts falls through to its defaults
  const fromEnv = (key: string) => JSON.stringify(env[key] ?? '');
  return {
    plugins: [react()],
    define: {
      'process.env.SUMMARY_URL': fromEnv('SUMMARY_URL'),
      'process.env.WORLD_3D_URL': fromEnv('WORLD_3D_URL'),
      'process.env.WORLD_DRIVE_URL': fromEnv('WORLD_DRIVE_URL'),
      'process.env.WORLD_FLY_URL': fromEnv('WORLD_FLY_URL'),
      'process.env.WORLD_SIT_URL': fromEnv('WORLD_SIT_URL'),
      'process.env.WORLD_BASE_URL': fromEnv('WORLD_BASE_URL'),
      'process.env.MAP_TILE_URL': fromEnv('MAP_TILE_URL')
    },
    build: {
      outDir: 'dist',
      sourcemap: true,
      rollupOptions: {
        input: {
          dashboard: resolve(process.cwd(), 'index.html'),
          drive: resolve(process.cwd(), 'drive.html')
        }
      }
    }
  };
});
