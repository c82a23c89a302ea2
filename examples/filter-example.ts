#!/usr/bin/env node
/**
 * Example: classifying a few agent events with the memory filter
 *
 * Reads memsift.toml.example from the repository root. Without API keys in
 * the environment every provider is skipped and each decision comes back as
 * `filter_disabled`.
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createMemoryFilter } from '@memsift/filter';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const events: Array<[string, string]> = [
  ['User asked to always use tabs for indentation', 'editor preferences'],
  ['Fixed off-by-one in pagination helper', 'src/pagination.ts'],
  ['Homebrew openssl needs LDFLAGS set before pip install', 'macOS 14'],
];

async function main() {
  const configPath = path.join(__dirname, '..', 'memsift.toml.example');
  console.log(`Loading config from: ${configPath}\n`);

  const { filter, sessions } = createMemoryFilter({ configPath });
  const providers = sessions.getStats().providers;
  console.log(
    `Providers: ${providers.length > 0 ? providers.map((p) => `${p.name}/${p.model}`).join(', ') : '(none available)'}\n`
  );

  for (const [event, context] of events) {
    const decision = await filter.shouldStore(event, context, 'example-agent');
    console.log(`${decision.should_store ? 'STORE' : 'SKIP '} ${decision.category.padEnd(18)} ${event}`);
    if (decision.reason) {
      console.log(`      ${decision.reason}`);
    }
  }

  console.log(`\nSessions: ${JSON.stringify(sessions.listSessions().map((s) => s.toSnapshot()), null, 2)}`);
  sessions.cleanupSession('example-agent');
}

main().catch((error: unknown) => {
  console.error('Example failed:', error);
  process.exit(1);
});
