/// <reference types="node" />
import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

const srcDir = fileURLToPath(new URL('./src', import.meta.url));

/**
 * Vite configuration for the OptionSync admin widget
 *
 * Bundles the widget entry into one classic script the admin page can load
 */
export default defineConfig({
  resolve: {
    alias: {
      '@': srcDir,
    },
  },
  build: {
    outDir: 'dist',
    emptyOutDir: true,
    sourcemap: true,
    minify: false, // Set to 'terser' for production
    rollupOptions: {
      input: {
        optionsync: fileURLToPath(new URL('./src/widget/widget.ts', import.meta.url)),
      },
      output: {
        entryFileNames: '[name].js',
        assetFileNames: 'assets/[name].[ext]',
        format: 'iife', // Loaded through a plain <script> tag by the admin form
      },
    },
  },
});
