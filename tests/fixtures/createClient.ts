import { CloudnsClient } from '../../src/CloudnsClient.js';
import type { CloudnsClientConfig } from '../../src/CloudnsClient.js';
import { RecordingTransport } from './RecordingTransport.js';

export const TEST_AUTH = { 'auth-id': 'test-auth-id', 'auth-password': 'test-secret' } as const;

/** A client with placeholder credentials talking to an in-process transport. */
export function createClient(config: CloudnsClientConfig = {}) {
  const transport = new RecordingTransport();
  const client = new CloudnsClient({ authId: 'test-auth-id', authPassword: 'test-secret', transport, ...config });
  return { client, transport };
}
