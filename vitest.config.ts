import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@provisioner/shared': fromRoot('./modules/shared/src/index.ts'),
      '@provisioner/ldap-gateway': fromRoot('./modules/directory/ldap_gateway/src/index.ts'),
      '@provisioner/document-portal': fromRoot('./modules/verification/document_portal/src/index.ts'),
      '@provisioner/student-registration': fromRoot('./modules/registration/student_registration/src/index.ts'),
    },
  },
  test: {
    include: ['tests/specs/**/*.spec.ts'],
    setupFiles: ['tests/setup.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
