import { afterAll, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

process.on('unhandledRejection', (reason: unknown) => {
  console.error('UNHANDLED_REJECTION', reason);
});

// GLOBAL TEST SANDBOX & NETWORK BLOCKING
const blockMsg = 'NETWORK BLOCKED: Unit tests must not access external resources. Use vi.spyOn() or mocks.';

vi.mock('http', async (importOriginal) => {
  const actual = await importOriginal<typeof import('http')>();
  return {
    ...actual,
    request: () => { throw new Error(blockMsg); },
    get: () => { throw new Error(blockMsg); }
  };
});

vi.mock('https', async (importOriginal) => {
  const actual = await importOriginal<typeof import('https')>();
  return {
    ...actual,
    request: () => { throw new Error(blockMsg); },
    get: () => { throw new Error(blockMsg); }
  };
});

globalThis.fetch = async () => { throw new Error(blockMsg); };

// Scratch space for archives and exports written by tests
const testDataRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'capstone-test-env-'));
process.env.CAPSTONE_TEST_ROOT = testDataRoot;

// Keep CLI tests independent of the developer's shell
delete process.env.CAPSTONE_CSV_DECIMAL;
delete process.env.CAPSTONE_CSV_SEPARATOR;
delete process.env.CAPSTONE_MISSING_DATA;

afterAll(async () => {
  try {
    await fs.promises.rm(testDataRoot, { recursive: true, force: true });
  } catch (e) {
    console.error('Failed to cleanup test sandbox', e);
  }
});
