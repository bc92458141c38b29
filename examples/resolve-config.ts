/**
 * Example: Layered configuration with secret references
 *
 * Loads examples/appsettings.json and APP_-prefixed environment variables,
 * then replaces every Vault and Key Vault reference with the secret it names.
 *
 * Setup:
 * 1. Put VAULT_TOKEN (or VAULT_ROLE_ID and VAULT_SECRET_ID) in .env
 * 2. Override any value with APP_Section__Key, e.g. APP_Database__Password
 * 3. Run: npm run example
 */

import 'dotenv/config'; // Load .env before anything reads process.env
import { fileURLToPath } from 'url';
import {
  AuditService,
  ConfigurationBuilder,
  addKeyVaultReferenceResolver,
  addVaultReferenceResolver,
  sanitizeError,
} from '../src/index.js';

async function main() {
  const auditService = new AuditService({
    enabled: true,
    onOverflow: (entries) => console.warn(`[Example] Audit buffer full (${entries.length} entries)`),
  });

  const builder = await new ConfigurationBuilder()
    .addJsonFile(fileURLToPath(new URL('./appsettings.json', import.meta.url)))
    .then((b) => b.addEnvironment('APP_'));

  await addVaultReferenceResolver(builder, { mountPath: 'secret', timeout: 10_000 }, { auditService });
  await addKeyVaultReferenceResolver(builder, {}, { auditService });

  const config = builder.build();

  // Never print resolved values
  for (const key of config.keys()) {
    console.log(`   - ${key}: ${config.get(key) ? 'set' : 'empty'}`);
  }
}

main().catch((error: unknown) => {
  console.error('[Example] Failed to load configuration', sanitizeError(error));
  process.exit(1);
});
