import { vi } from 'vitest';
import { RecordingChangeListener } from '../src/change-listener.js';
import { MdbClient } from '../src/client.js';
import type { ClientLogger, JsonApiOptions } from '../src/types.js';
import { FAKE_HOST, FakeMdb } from './fake-mdb.js';

export const TEST_USER_ID = 'test-user';

/**
 * Test context with its own fake mdb service
 */
export interface TestContext {
  mdb: FakeMdb;
  client: MdbClient;
  changes: RecordingChangeListener;
  logger: ClientLogger;
  cleanup: () => Promise<void>;
}

export function quietLogger(): ClientLogger {
  return { trace: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * Setup test with an isolated fake service
 */
export async function setupTest(
  testName: string,
  options: Partial<JsonApiOptions> = {}
): Promise<TestContext> {
  const mdb = new FakeMdb();
  const changes = new RecordingChangeListener();
  const logger = quietLogger();

  const client = new MdbClient(`${FAKE_HOST}/ignored/path`, {
    userId: TEST_USER_ID,
    correlationId: `test-${testName}`,
    fetch: mdb.fetch,
    logger,
    changeListener: changes,
    ...options
  });

  return {
    mdb,
    client,
    changes,
    logger,
    cleanup: async () => {
      await client.close();
    }
  };
}
