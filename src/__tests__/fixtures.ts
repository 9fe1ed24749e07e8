/**
 * Shared setup for tests running against the in-memory server.
 */

import { DataApiClient } from '../client/index.js';
import { DataApiConfig } from '../config.js';
import {
  InMemoryDataApi,
  type InMemoryDataApiOptions,
  type InMemoryLayoutDefinition,
} from '../mocks/index.js';
import { createInMemoryObservability } from '../observability/index.js';

export const BASE_URL = 'https://fms.test';

export const CONTACTS_LAYOUT: InMemoryLayoutDefinition = {
  name: 'Contacts',
  fields: [
    { name: 'name' },
    { name: 'city' },
    { name: 'age', result: 'number' },
    { name: 'birthday', result: 'date' },
    { name: 'alarm', result: 'time' },
    { name: 'updatedAt', result: 'timeStamp' },
    { name: 'photo', result: 'container' },
    { name: 'label', type: 'calculation' },
    { name: 'phone', maxRepeat: 2 },
    { name: 'g_user', global: true },
  ],
  portals: {
    Phones: {
      table: 'Phones',
      fields: [{ name: 'Phones::number' }, { name: 'Phones::kind' }],
    },
  },
};

export function createServer(options: InMemoryDataApiOptions = {}): InMemoryDataApi {
  return new InMemoryDataApi({
    layouts: [
      CONTACTS_LAYOUT,
      { name: 'Contact Summary', table: 'Contacts', fields: [{ name: 'name' }] },
    ],
    layoutFolders: { Reports: ['Contact Summary'] },
    scripts: {
      Greet: (param) => `Hello ${param ?? 'nobody'}`,
      Touch: () => undefined,
    },
    ...options,
  });
}

export function testConfig(): DataApiConfig {
  return DataApiConfig.builder()
    .baseUrl(BASE_URL)
    .database('Contacts')
    .layout('Contacts')
    .credentials('admin', 'test-secret')
    .build();
}

/**
 * Client wired to an in-memory server, with in-memory logs and metrics.
 */
export function createTestClient(server: InMemoryDataApi = createServer()) {
  const observability = createInMemoryObservability();
  const client = new DataApiClient(testConfig(), { transport: server, observability });
  return { client, server, observability };
}

/**
 * Requests the server received for record data, ignoring metadata lookups.
 */
export function recordRequests(server: InMemoryDataApi) {
  return server
    .getRequests()
    .filter((request) => /\/records|\/_find/.test(request.path));
}
