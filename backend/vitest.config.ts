import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const srcDir = fileURLToPath(new URL('./src', import.meta.url));
const contractsEntry = fileURLToPath(new URL('../packages/contracts/src/index.ts', import.meta.url));

export default defineConfig({
  root: fileURLToPath(new URL('.', import.meta.url)),
  resolve: {
    alias: {
      '@shared': `${srcDir}/shared`,
      '@modules': `${srcDir}/modules`,
      '@microblog/contracts': contractsEntry,
    },
  },
  test: {
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    env: {
      NODE_ENV: 'test',
      DATABASE_TYPE: 'sqlite',
      SQLITE_PATH: ':memory:',
      SECRET_KEY: 'test-secret-key-0123456789',
      BCRYPT_ROUNDS: '4',
      POSTS_PER_PAGE: '25',
      FRONTEND_URL: 'http://localhost:5173',
      MAIL_SERVER: '',
      RESEND_API_KEY: '',
    },
    include: ['__tests__/**/*.test.ts', 'test/**/*.test.ts'],
    pool: 'forks',
    testTimeout: 20000,
  },
});
