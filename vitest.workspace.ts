import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/validation/vitest.config.ts',
  'packages/consolidation/vitest.config.ts',
  'packages/state-sequelize/vitest.config.ts',
]);
