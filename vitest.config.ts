import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packageEntry = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
  },
  resolve: {
    alias: {
      '@compliance-rag/rag-observability': packageEntry('rag-observability'),
      '@compliance-rag/rag-prompts': packageEntry('rag-prompts'),
      '@compliance-rag/rag-llm': packageEntry('rag-llm'),
      '@compliance-rag/rag-grounding': packageEntry('rag-grounding'),
      '@compliance-rag/rag-agent': packageEntry('rag-agent'),
    },
  },
});
